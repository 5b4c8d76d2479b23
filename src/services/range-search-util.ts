import { IpUtil } from "./ip-util";

export const IPV4_RANGE_PREFIX = "geoip:v4:range:";
export const IPV6_RANGE_PREFIX = "geoip:v6:range:";

/**
 * Range representation for binary search
 */
export interface IpRange<T extends number | bigint> {
  startIp: T;
  endIp: T;
  key: string;
}

/**
 * Binary search over ranges stored as `geoip:v{4,6}:range:{start}:{end}`
 * keys, where start and end are the numeric form of the address.
 */
export class RangeSearchUtil {
  /**
   * Build the Redis key for an IPv4 range
   * @param startIp - first address as a 32-bit integer
   * @param endIp - last address as a 32-bit integer
   */
  static ipv4Key(startIp: number, endIp: number): string {
    return `${IPV4_RANGE_PREFIX}${startIp}:${endIp}`;
  }

  /**
   * Build the Redis key for an IPv6 range
   */
  static ipv6Key(startIp: bigint, endIp: bigint): string {
    return `${IPV6_RANGE_PREFIX}${startIp}:${endIp}`;
  }

  /**
   * Find the range containing a numeric address using binary search
   * @param value - address in numeric form
   * @param ranges - must be sorted by startIp and non-overlapping
   * @returns the matching range, or null if no range contains the address
   */
  static findRange<T extends number | bigint>(
    value: T,
    ranges: IpRange<T>[]
  ): IpRange<T> | null {
    let left = 0;
    let right = ranges.length - 1;

    while (left <= right) {
      const mid = Math.floor((left + right) / 2);
      const range = ranges[mid];

      if (value >= range.startIp && value <= range.endIp) {
        // Found the range
        return range;
      } else if (value < range.startIp) {
        // Look in left half
        right = mid - 1;
      } else {
        // Look in right half
        left = mid + 1;
      }
    }

    return null;
  }

  /**
   * Find the range containing an IPv4 address
   */
  static findIpv4Range(
    ip: string,
    ranges: IpRange<number>[]
  ): IpRange<number> | null {
    return this.findRange(IpUtil.ipToLong(ip), ranges);
  }

  /**
   * Find the range containing an IPv6 address
   */
  static findIpv6Range(
    ip: string,
    ranges: IpRange<bigint>[]
  ): IpRange<bigint> | null {
    return this.findRange(IpUtil.ipv6ToBigInt(ip), ranges);
  }

  /**
   * Parse IPv4 range keys into ranges sorted for {@link findRange}.
   * Keys of other kinds are ignored; malformed ones are skipped.
   */
  static parseIpv4RangesFromKeys(keys: string[]): IpRange<number>[] {
    return keys
      .filter((key) => key.startsWith(IPV4_RANGE_PREFIX))
      .map((key): IpRange<number> | null => {
        const [start, end] = key.slice(IPV4_RANGE_PREFIX.length).split(":");
        // Both bounds must be plain digits; Number("") would read as 0
        if (!/^\d+$/.test(start ?? "") || !/^\d+$/.test(end ?? "")) {
          console.warn(`Skipping malformed IPv4 range key: ${key}`);
          return null;
        }
        return { startIp: Number(start), endIp: Number(end), key };
      })
      .filter((range): range is IpRange<number> => range !== null)
      .sort((a, b) => a.startIp - b.startIp);
  }

  /**
   * Parse IPv6 range keys; BigInt bounds are compared without subtraction
   */
  static parseIpv6RangesFromKeys(keys: string[]): IpRange<bigint>[] {
    return keys
      .filter((key) => key.startsWith(IPV6_RANGE_PREFIX))
      .map((key): IpRange<bigint> | null => {
        const [start, end] = key.slice(IPV6_RANGE_PREFIX.length).split(":");
        if (!/^\d+$/.test(start ?? "") || !/^\d+$/.test(end ?? "")) {
          console.warn(`Skipping malformed IPv6 range key: ${key}`);
          return null;
        }
        return { startIp: BigInt(start), endIp: BigInt(end), key };
      })
      .filter((range): range is IpRange<bigint> => range !== null)
      .sort((a, b) => (a.startIp < b.startIp ? -1 : a.startIp > b.startIp ? 1 : 0));
  }
}
