import { MaxMindDriver } from "../../src/drivers/maxmind-driver";

const mockOpen = jest.fn();

jest.mock("maxmind", () => ({
  __esModule: true,
  default: { open: (...args: unknown[]) => mockOpen(...args) },
}));

const cityResponse = {
  country: { iso_code: "US", names: { en: "United States" } },
  subdivisions: [{ iso_code: "CA", names: { en: "California" } }],
  city: { names: { en: "Mountain View" } },
  postal: { code: "94043" },
  location: {
    latitude: 37.386,
    longitude: -122.0838,
    metro_code: 807,
    time_zone: "America/Los_Angeles",
  },
};

describe("MaxMindDriver", () => {
  beforeEach(() => {
    mockOpen.mockReset();
  });

  test("maps a city record", async () => {
    const get = jest.fn().mockReturnValue(cityResponse);
    mockOpen.mockResolvedValue({ get });
    const driver = new MaxMindDriver("/data/test-city.mmdb");

    const location = await driver.get("192.0.2.1");

    expect(mockOpen).toHaveBeenCalledWith("/data/test-city.mmdb");
    expect(get).toHaveBeenCalledWith("192.0.2.1");
    expect(location).toEqual({
      error: false,
      ip: "192.0.2.1",
      driver: "MaxMind",
      countryCode: "US",
      countryName: "United States",
      regionCode: "CA",
      regionName: "California",
      cityName: "Mountain View",
      postalCode: "94043",
      isoCode: "US",
      latitude: 37.386,
      longitude: -122.0838,
      metroCode: "807",
      timezone: "America/Los_Angeles",
    });
  });

  test("leaves out attributes the database does not have", async () => {
    mockOpen.mockResolvedValue({
      get: () => ({ country: { iso_code: "DE", names: { en: "Germany" } } }),
    });

    const location = await new MaxMindDriver("test.mmdb").get("192.0.2.2");

    expect(location).toEqual({
      error: false,
      ip: "192.0.2.2",
      driver: "MaxMind",
      countryCode: "DE",
      countryName: "Germany",
      isoCode: "DE",
    });
  });

  test("reports an address the database does not know", async () => {
    mockOpen.mockResolvedValue({ get: () => null });

    const location = await new MaxMindDriver("test.mmdb").get("10.0.0.1");

    expect(location).toEqual({ error: true, ip: "10.0.0.1", driver: "MaxMind" });
  });

  test("opens the database once", async () => {
    mockOpen.mockResolvedValue({ get: () => cityResponse });
    const driver = new MaxMindDriver("test.mmdb");

    await driver.get("192.0.2.1");
    await driver.get("192.0.2.2");

    expect(mockOpen).toHaveBeenCalledTimes(1);
  });

  test("reports a missing database as an error and retries the open later", async () => {
    const consoleError = jest
      .spyOn(console, "error")
      .mockImplementation(() => undefined);
    mockOpen
      .mockRejectedValueOnce(new Error("ENOENT: no such file"))
      .mockResolvedValueOnce({ get: () => cityResponse });
    const driver = new MaxMindDriver("missing.mmdb");

    const first = await driver.get("192.0.2.1");
    const second = await driver.get("192.0.2.1");

    expect(first).toEqual({ error: true, ip: "192.0.2.1", driver: "MaxMind" });
    expect(second.error).toBe(false);
    expect(mockOpen).toHaveBeenCalledTimes(2);
    expect(consoleError).toHaveBeenCalledTimes(1);
    consoleError.mockRestore();
  });
});
