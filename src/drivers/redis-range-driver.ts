import {
  createLocation,
  erroredLocation,
  LocationRecord,
} from "../models/location";
import { IpUtil } from "../services/ip-util";
import {
  IpRange,
  RangeSearchUtil,
} from "../services/range-search-util";
import { RedisStore } from "../services/redis-client";
import { Driver } from "./driver";

const RANGE_UPDATE_INTERVAL = 60 * 1000;

/**
 * Looks addresses up in ranges imported into Redis by the CSV import
 * script. Range keys are scanned into a sorted in-process index that is
 * refreshed once a minute; the matching hash holds the location fields.
 */
export class RedisRangeDriver implements Driver {
  readonly name = "RedisRange";
  private ipv4Ranges: IpRange<number>[] = [];
  private ipv6Ranges: IpRange<bigint>[] = [];
  private lastRangeUpdate: number | null = null;

  constructor(
    private readonly store: RedisStore,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Find the imported range holding an address and read its location hash
   * @param ip - address to locate
   * @returns the location, or an errored record when no range matches
   */
  async get(ip: string): Promise<LocationRecord> {
    try {
      const version = IpUtil.getIpVersion(ip);
      if (!version) {
        console.warn(`RedisRange cannot look up non-IP value: ${ip}`);
        return erroredLocation(ip, this.name);
      }

      // Refresh range index if needed
      await this.ensureRangesCached();

      // Binary search over the sorted ranges

      const range =
        version === 4
          ? RangeSearchUtil.findIpv4Range(ip, this.ipv4Ranges)
          : RangeSearchUtil.findIpv6Range(ip, this.ipv6Ranges);

      if (!range) {
        console.log(`No Redis range contains ${ip}`);
        return erroredLocation(ip, this.name);
      }

      // Fetch location data
      const data = await this.store.hGetAll(range.key);
      if (Object.keys(data).length === 0) {
        console.warn(`Range ${range.key} disappeared since the last refresh`);
        return erroredLocation(ip, this.name);
      }

      return createLocation({
        error: false,
        ip,
        driver: this.name,
        countryCode: data.countryCode,
        countryName: data.countryName,
        regionName: data.regionName,
        cityName: data.cityName,
        postalCode: data.postalCode,
        latitude: toCoordinate(data.latitude),
        longitude: toCoordinate(data.longitude),
      });
    } catch (error) {
      console.error(`RedisRange lookup failed for ${ip}:`, error);
      return erroredLocation(ip, this.name);
    }
  }

  /**
   * Rescan the range keys when the index is older than a minute
   */
  private async ensureRangesCached(): Promise<void> {
    const now = this.now();
    if (
      this.lastRangeUpdate !== null &&
      now - this.lastRangeUpdate <= RANGE_UPDATE_INTERVAL
    ) {
      return;
    }

    const keys = await this.store.scanKeys("geoip:*:range:*");
    this.ipv4Ranges = RangeSearchUtil.parseIpv4RangesFromKeys(keys);
    this.ipv6Ranges = RangeSearchUtil.parseIpv6RangesFromKeys(keys);
    this.lastRangeUpdate = now;

    console.log(
      `Updated IP range cache: ${this.ipv4Ranges.length} IPv4 ranges, ${this.ipv6Ranges.length} IPv6 ranges`
    );
  }
}

/**
 * Hash fields are strings; an empty or non-numeric coordinate is absent
 */
function toCoordinate(value: string | undefined): number | undefined {
  if (value === undefined || value === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}
