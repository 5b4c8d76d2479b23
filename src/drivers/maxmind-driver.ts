import maxmind, { CityResponse, Reader } from "maxmind";
import { LocationConfig } from "../config/location-config";
import {
  createLocation,
  erroredLocation,
  LocationRecord,
} from "../models/location";
import { Driver } from "./driver";

/**
 * Looks addresses up in a local MaxMind city database (.mmdb).
 * The reader is opened on first use.
 */
export class MaxMindDriver implements Driver {
  readonly name = "MaxMind";
  private reader: Promise<Reader<CityResponse>> | null = null;

  constructor(private readonly databasePath: string) {}

  static fromConfig(config: LocationConfig): MaxMindDriver {
    return new MaxMindDriver(config.maxmind.databasePath);
  }

  /**
   * Look up an address in the city database
   * @param ip - address to locate
   * @returns the location, or an errored record when the database has no entry
   */
  async get(ip: string): Promise<LocationRecord> {
    try {
      const result = (await this.open()).get(ip);

      if (!result) {
        console.log(`MaxMind has no record for ${ip}`);
        return erroredLocation(ip, this.name);
      }

      // Most specific subdivision first
      const subdivision = result.subdivisions?.[0];

      return createLocation({
        error: false,
        ip,
        driver: this.name,
        countryCode: result.country?.iso_code,
        countryName: result.country?.names.en,
        regionCode: subdivision?.iso_code,
        regionName: subdivision?.names.en,
        cityName: result.city?.names.en,
        postalCode: result.postal?.code,
        isoCode: result.country?.iso_code,
        latitude: result.location?.latitude,
        longitude: result.location?.longitude,
        metroCode: result.location?.metro_code?.toString(),
        timezone: result.location?.time_zone,
      });
    } catch (error) {
      console.error(`MaxMind lookup failed for ${ip}:`, error);
      return erroredLocation(ip, this.name);
    }
  }

  private open(): Promise<Reader<CityResponse>> {
    if (!this.reader) {
      this.reader = maxmind.open<CityResponse>(this.databasePath);
      // A failed open is retried on the next lookup
      this.reader.catch(() => {
        this.reader = null;
      });
    }
    return this.reader;
  }
}
