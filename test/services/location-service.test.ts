import { LocationConfig } from "../../src/config/location-config";
import {
  DriverNotFoundError,
  FieldNotFoundError,
  InvalidAddressError,
  NoDriverAvailableError,
} from "../../src/errors/location-errors";
import { DriverFactory } from "../../src/services/driver-factory";
import { IpResolver } from "../../src/services/ip-resolver";
import {
  LOCATION_SESSION_KEY,
  LocationService,
} from "../../src/services/location-service";
import { MemorySessionProvider } from "../../src/sessions/memory-session";
import { Session } from "../../src/sessions/session";
import { StubDriver } from "../fixtures/stub-driver";
import { testConfig } from "../utils/test-config";

const US = {
  countryCode: "US",
  countryName: "United States",
  cityName: "Chicago",
  latitude: 41.88,
};

interface Setup {
  session: Session;
  drivers: DriverFactory;
  service: () => LocationService;
}

function setup(
  stubs: StubDriver[],
  overrides: Partial<LocationConfig> = {}
): Setup {
  const config = testConfig(overrides);
  const drivers = new DriverFactory(
    config,
    Object.fromEntries(stubs.map((stub) => [stub.name, () => stub]))
  );
  const session = new MemorySessionProvider(60).forSession("visitor-1");
  const ipResolver = new IpResolver(config, {
    headers: {},
    remoteAddress: "203.0.113.7",
    env: {},
  });

  return {
    session,
    drivers,
    service: () => new LocationService({ config, drivers, session, ipResolver }),
  };
}

describe("LocationService", () => {
  describe("get", () => {
    test("returns the selected driver's location and caches it", async () => {
      const primary = new StubDriver("Primary", US);
      const { service, session } = setup([primary]);

      const location = await service().get("8.8.8.8");

      expect(location).toEqual({
        error: false,
        ip: "8.8.8.8",
        driver: "Primary",
        countryCode: "US",
        countryName: "United States",
        cityName: "Chicago",
        latitude: 41.88,
      });
      expect(primary.lookups).toEqual(["8.8.8.8"]);
      expect(await session.get(LOCATION_SESSION_KEY)).toEqual(location);
    });

    test("detects the address from the request when none is given", async () => {
      const primary = new StubDriver("Primary", US);
      const { service } = setup([primary]);

      await service().get();

      expect(primary.lookups).toEqual(["203.0.113.7"]);
    });

    test("uses the first fallback that succeeds", async () => {
      const primary = new StubDriver("Primary", "error");
      const first = new StubDriver("A", "error");
      const second = new StubDriver("B", { countryCode: "CA", cityName: "Toronto" });
      const third = new StubDriver("C", US);
      const { service, session } = setup([primary, first, second, third], {
        fallbackDrivers: ["A", "B", "C"],
      });

      const location = await service().get("198.51.100.1");

      expect(location).toEqual({
        error: false,
        ip: "198.51.100.1",
        driver: "B",
        countryCode: "CA",
        cityName: "Toronto",
      });
      expect(first.lookups).toEqual(["198.51.100.1"]);
      expect(second.lookups).toEqual(["198.51.100.1"]);
      expect(third.lookups).toEqual([]);
      expect(await session.get(LOCATION_SESSION_KEY)).toEqual(location);
    });

    test("does not consult fallbacks when the selected driver succeeds", async () => {
      const fallback = new StubDriver("A", US);
      const { service } = setup([new StubDriver("Primary", US), fallback], {
        fallbackDrivers: ["A"],
      });

      await service().get("8.8.8.8");

      expect(fallback.lookups).toEqual([]);
    });

    test("fails with NoDriverAvailable when there are no fallbacks", async () => {
      const { service, session } = setup([new StubDriver("Primary", "error")]);

      await expect(service().get("8.8.8.8")).rejects.toThrow(NoDriverAvailableError);
      await expect(service().get("8.8.8.8")).rejects.toMatchObject({
        lastDriver: "Primary",
      });
      expect(await session.has(LOCATION_SESSION_KEY)).toBe(false);
    });

    test("names the last fallback when every driver fails", async () => {
      const { service, session } = setup(
        [
          new StubDriver("Primary", "error"),
          new StubDriver("A", "error"),
          new StubDriver("B", "error"),
        ],
        { fallbackDrivers: ["A", "B"] }
      );

      await expect(service().get("8.8.8.8")).rejects.toMatchObject({
        name: "NoDriverAvailableError",
        lastDriver: "B",
      });
      expect(await session.has(LOCATION_SESSION_KEY)).toBe(false);
    });

    test("treats a driver that throws as a failed lookup", async () => {
      const { service } = setup(
        [
          new StubDriver("Primary", new Error("socket hang up")),
          new StubDriver("A", US),
        ],
        { fallbackDrivers: ["A"] }
      );
      const consoleError = jest
        .spyOn(console, "error")
        .mockImplementation(() => undefined);

      const location = await service().get("8.8.8.8");

      expect(location.driver).toBe("A");
      expect(consoleError).toHaveBeenCalledTimes(1);
      consoleError.mockRestore();
    });

    test("returns the session's location without consulting any driver", async () => {
      const primary = new StubDriver("Primary", US);
      const { service } = setup([primary]);

      const first = await service().get("8.8.8.8");
      const second = await service().get("1.1.1.1");

      expect(second).toEqual(first);
      expect(second.ip).toBe("8.8.8.8");
      expect(primary.lookups).toEqual(["8.8.8.8"]);
    });

    test("rejects an invalid address before any driver runs", async () => {
      const primary = new StubDriver("Primary", US);
      const { service } = setup([primary]);

      await expect(service().get("999.1.1.1")).rejects.toThrow(InvalidAddressError);
      await expect(service().get("not-an-ip")).rejects.toMatchObject({
        address: "not-an-ip",
      });
      expect(primary.lookups).toEqual([]);
    });

    test("ignores a session value that is not a location record", async () => {
      const primary = new StubDriver("Primary", US);
      const { service, session } = setup([primary]);
      await session.set(LOCATION_SESSION_KEY, { country: "US" });

      const location = await service().get("8.8.8.8");

      expect(location.driver).toBe("Primary");
      expect(primary.lookups).toEqual(["8.8.8.8"]);
    });

    test("forgets the session's location on every call when configured to", async () => {
      const primary = new StubDriver("Primary", US);
      const { service } = setup([primary], {
        localhostTesting: true,
        localhostForgetLocation: true,
      });

      await service().get();
      await service().get();

      expect(primary.lookups).toEqual(["66.102.0.0", "66.102.0.0"]);
    });
  });

  describe("field projection", () => {
    test("returns a single attribute", async () => {
      const { service } = setup([new StubDriver("Primary", US)]);

      expect(await service().get("8.8.8.8", "countryCode")).toBe("US");
      expect(await service().get(undefined, "latitude")).toBe(41.88);
    });

    test("fails with FieldNotFound after caching the location", async () => {
      const primary = new StubDriver("Primary", { countryCode: "US" });
      const { service, session } = setup([primary]);

      await expect(service().get("8.8.8.8", "cityName")).rejects.toThrow(
        FieldNotFoundError
      );
      await expect(service().get("8.8.8.8", "country")).rejects.toMatchObject({
        field: "country",
      });

      expect(await session.get(LOCATION_SESSION_KEY)).toEqual({
        error: false,
        ip: "8.8.8.8",
        driver: "Primary",
        countryCode: "US",
      });
      expect(primary.lookups).toEqual(["8.8.8.8"]);
    });
  });

  describe("is", () => {
    test("matches attribute values ignoring case", async () => {
      const service = setup([new StubDriver("Primary", US)]).service();
      await service.get("8.8.8.8");

      expect(await service.is("us")).toBe(true);
      expect(await service.is("CHICAGO")).toBe(true);
      expect(await service.is("41.88")).toBe(true);
    });

    test("does not match attribute names or absent values", async () => {
      const service = setup([new StubDriver("Primary", US)]).service();
      await service.get("8.8.8.8");

      expect(await service.is("countryCode")).toBe(false);
      expect(await service.is("CA")).toBe(false);
      expect(await service.is("false")).toBe(false);
    });

    test("resolves the location first when none is loaded", async () => {
      const primary = new StubDriver("Primary", US);
      const service = setup([primary]).service();

      expect(await service.is("united states")).toBe(true);
      expect(primary.lookups).toEqual(["203.0.113.7"]);
    });

    test("reuses the loaded location", async () => {
      const primary = new StubDriver("Primary", US);
      const service = setup([primary]).service();
      await service.get();

      expect(await service.is("US")).toBe(true);
      expect(primary.lookups).toEqual(["203.0.113.7"]);
    });

    test("resolves afresh on every call when configured to forget", async () => {
      const primary = new StubDriver("Primary", US);
      const service = setup([primary], {
        localhostTesting: true,
        localhostForgetLocation: true,
      }).service();
      await service.get();

      expect(await service.is("US")).toBe(true);
      expect(await service.is("Chicago")).toBe(true);
      expect(primary.lookups).toEqual(["66.102.0.0", "66.102.0.0", "66.102.0.0"]);
    });
  });

  describe("drivers", () => {
    test("fails at construction when the selected driver is unknown", () => {
      const { service } = setup([new StubDriver("Primary", US)], {
        selectedDriver: "primary",
      });

      expect(() => service()).toThrow(DriverNotFoundError);
    });

    test("fails when an unknown fallback is reached", async () => {
      const { service } = setup([new StubDriver("Primary", "error")], {
        fallbackDrivers: ["Missing"],
      });

      await expect(service().get("8.8.8.8")).rejects.toMatchObject({
        name: "DriverNotFoundError",
        driver: "Missing",
      });
    });
  });

  describe("lists", () => {
    test("maps country codes to names by default", () => {
      const service = setup([new StubDriver("Primary", US)]).service();

      expect(service.lists()).toEqual({
        CA: "Canada",
        DE: "Germany",
        US: "United States",
      });
    });

    test("uses the requested value and name fields", () => {
      const service = setup([new StubDriver("Primary", US)]).service();

      expect(service.lists("countryName", "countryCode")).toEqual({
        Canada: "CA",
        Germany: "DE",
        "United States": "US",
      });
      expect(service.dropdown("countryName", "countryCode")).toEqual(
        service.lists("countryName", "countryCode")
      );
    });

    test("falls back to the configured fields individually", () => {
      const service = setup([new StubDriver("Primary", US)], {
        dropdown: { value: "countryName", name: "countryName" },
      }).service();

      expect(service.lists("countryCode")).toEqual({
        CA: "Canada",
        DE: "Germany",
        US: "United States",
      });
    });
  });
});
