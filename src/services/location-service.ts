import {
  CountryListField,
  LocationConfig,
} from "../config/location-config";
import { Driver } from "../drivers/driver";
import {
  FieldNotFoundError,
  NoDriverAvailableError,
} from "../errors/location-errors";
import {
  erroredLocation,
  hasLocationField,
  LocationRecord,
  LocationValue,
  parseLocation,
} from "../models/location";
import { Session } from "../sessions/session";
import { CountryList } from "./country-list";
import { DriverFactory } from "./driver-factory";
import { IpResolver } from "./ip-resolver";

export const LOCATION_SESSION_KEY = "location";

export interface LocationServiceOptions {
  config: LocationConfig;
  drivers: DriverFactory;
  session: Session;
  ipResolver: IpResolver;
}

/**
 * Resolves the visitor's location for one session.
 *
 * The first successful lookup is kept in the session and returned for
 * every later call in that session, whatever `ip` those calls pass.
 */
export class LocationService {
  private readonly config: LocationConfig;
  private readonly drivers: DriverFactory;
  private readonly session: Session;
  private readonly ipResolver: IpResolver;
  private readonly driver: Driver;
  private readonly countries: CountryList;
  private location: LocationRecord | null = null;

  constructor(options: LocationServiceOptions) {
    this.config = options.config;
    this.drivers = options.drivers;
    this.session = options.session;
    this.ipResolver = options.ipResolver;
    this.driver = this.drivers.create(this.config.selectedDriver);
    this.countries = new CountryList(
      this.config.countryCodes,
      this.config.dropdown
    );
  }

  /**
   * Returns the visitor's location, or one attribute of it when `field`
   * is given.
   *
   * @throws InvalidAddressError when `ip` is given on a cache miss and is not an IP address
   * @throws NoDriverAvailableError when the selected driver and every fallback fail
   * @throws FieldNotFoundError when the resolved location has no such attribute
   */
  async get(ip?: string): Promise<LocationRecord>;
  async get(ip: string | undefined, field: string): Promise<LocationValue>;
  async get(
    ip?: string,
    field?: string
  ): Promise<LocationRecord | LocationValue> {
    const location = await this.resolveLocation(ip);

    if (field === undefined) {
      return location;
    }

    const value = hasLocationField(location, field) ? location[field] : undefined;
    if (value === undefined) {
      throw new FieldNotFoundError(field);
    }
    return value;
  }

  /**
   * True when any attribute value of the visitor's location equals
   * `value`, ignoring case. With the forget toggle on, the location is
   * always resolved afresh.
   */
  async is(value: string): Promise<boolean> {
    const location =
      this.location && !this.config.localhostForgetLocation
        ? this.location
        : await this.get();
    const needle = value.toLowerCase();

    return Object.values(location).some(
      (attribute) =>
        (typeof attribute === "string" || typeof attribute === "number") &&
        String(attribute).toLowerCase() === needle
    );
  }

  lists(
    valueField?: CountryListField,
    nameField?: CountryListField
  ): Record<string, string> {
    return this.countries.build(valueField, nameField);
  }

  /**
   * @deprecated Use {@link LocationService.lists}.
   */
  dropdown(
    valueField?: CountryListField,
    nameField?: CountryListField
  ): Record<string, string> {
    return this.lists(valueField, nameField);
  }

  private async resolveLocation(ip?: string): Promise<LocationRecord> {
    if (this.config.localhostForgetLocation) {
      await this.session.forget(LOCATION_SESSION_KEY);
    }

    const cached = await this.readCachedLocation();
    if (cached) {
      this.location = cached;
      return cached;
    }

    const address = this.ipResolver.resolve(ip);

    let location = await this.lookup(this.driver, address);
    if (location.error) {
      location = await this.lookupFallbacks(address);
    }

    await this.session.set(LOCATION_SESSION_KEY, location);
    this.location = location;
    return location;
  }

  private async readCachedLocation(): Promise<LocationRecord | null> {
    if (!(await this.session.has(LOCATION_SESSION_KEY))) {
      return null;
    }

    const location = parseLocation(await this.session.get(LOCATION_SESSION_KEY));
    if (!location) {
      console.warn("Ignoring session location that is not a location record");
    }
    return location;
  }

  private async lookupFallbacks(ip: string): Promise<LocationRecord> {
    let lastDriver = this.config.selectedDriver;

    for (const name of this.config.fallbackDrivers) {
      const driver = this.drivers.create(name);
      lastDriver = name;

      const location = await this.lookup(driver, ip);
      if (!location.error) {
        console.log(`Location for ${ip} resolved by fallback driver ${name}`);
        return location;
      }
    }

    throw new NoDriverAvailableError(lastDriver);
  }

  private async lookup(driver: Driver, ip: string): Promise<LocationRecord> {
    try {
      return await driver.get(ip);
    } catch (error) {
      console.error(`Driver ${driver.name} threw while looking up ${ip}:`, error);
      return erroredLocation(ip, driver.name);
    }
  }
}
