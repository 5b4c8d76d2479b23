import axios from "axios";
import { z } from "zod";
import { LocationConfig } from "../config/location-config";
import {
  createLocation,
  erroredLocation,
  LocationRecord,
} from "../models/location";
import { Driver } from "./driver";

const responseSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("success"),
    country: z.string().optional(),
    countryCode: z.string().optional(),
    region: z.string().optional(),
    regionName: z.string().optional(),
    city: z.string().optional(),
    zip: z.string().optional(),
    lat: z.number().optional(),
    lon: z.number().optional(),
    timezone: z.string().optional(),
    isp: z.string().optional(),
  }),
  z.object({
    status: z.literal("fail"),
    message: z.string().optional(),
  }),
]);

/**
 * Looks addresses up through the ip-api.com JSON endpoint.
 */
export class IpApiDriver implements Driver {
  readonly name = "IpApi";

  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number
  ) {}

  static fromConfig(config: LocationConfig): IpApiDriver {
    return new IpApiDriver(config.ipApi.url, config.ipApi.timeoutMs);
  }

  /**
   * Query ip-api.com for an address
   * @param ip - address to locate
   * @returns the location, or an errored record on a failed request or lookup
   */
  async get(ip: string): Promise<LocationRecord> {
    let data: unknown;
    try {
      const response = await axios.get<unknown>(
        `${this.baseUrl}${encodeURIComponent(ip)}`,
        { timeout: this.timeoutMs }
      );
      data = response.data;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`ip-api request failed for ${ip}: ${reason}`);
      return erroredLocation(ip, this.name);
    }

    // Validate response shape
    const parsed = responseSchema.safeParse(data);
    if (!parsed.success) {
      console.error(`Unexpected ip-api response for ${ip}:`, parsed.error.message);
      return erroredLocation(ip, this.name);
    }

    // ip-api answers 200 with status "fail" for private and reserved ranges
    const body = parsed.data;
    if (body.status === "fail") {
      console.log(`ip-api could not locate ${ip}: ${body.message ?? "unknown"}`);
      return erroredLocation(ip, this.name);
    }

    return createLocation({
      error: false,
      ip,
      driver: this.name,
      countryCode: body.countryCode,
      countryName: body.country,
      regionCode: body.region,
      regionName: body.regionName,
      cityName: body.city,
      zipCode: body.zip,
      latitude: body.lat,
      longitude: body.lon,
      timezone: body.timezone,
      isp: body.isp,
    });
  }
}
