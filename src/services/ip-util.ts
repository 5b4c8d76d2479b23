// Dotted quad without leading zeros: 01.02.03.004 is rejected
const IPV4_OCTET = "(25[0-5]|2[0-4][0-9]|1[0-9]{2}|[1-9]?[0-9])";
const IPV4_PATTERN = new RegExp(`^${IPV4_OCTET}(\\.${IPV4_OCTET}){3}$`);

// Full, compressed and IPv4-embedded forms; a zone index (fe80::1%eth0) is rejected
const IPV6_PATTERN =
  /^(([0-9a-fA-F]{1,4}:){7}[0-9a-fA-F]{1,4}|([0-9a-fA-F]{1,4}:){1,7}:|([0-9a-fA-F]{1,4}:){1,6}:[0-9a-fA-F]{1,4}|([0-9a-fA-F]{1,4}:){1,5}(:[0-9a-fA-F]{1,4}){1,2}|([0-9a-fA-F]{1,4}:){1,4}(:[0-9a-fA-F]{1,4}){1,3}|([0-9a-fA-F]{1,4}:){1,3}(:[0-9a-fA-F]{1,4}){1,4}|([0-9a-fA-F]{1,4}:){1,2}(:[0-9a-fA-F]{1,4}){1,5}|[0-9a-fA-F]{1,4}:((:[0-9a-fA-F]{1,4}){1,6})|:((:[0-9a-fA-F]{1,4}){1,7}|:)|::(ffff(:0{1,4})?:)?((25[0-5]|2[0-4][0-9]|1[0-9]{2}|[1-9]?[0-9])\.){3}(25[0-5]|2[0-4][0-9]|1[0-9]{2}|[1-9]?[0-9])|([0-9a-fA-F]{1,4}:){1,4}:((25[0-5]|2[0-4][0-9]|1[0-9]{2}|[1-9]?[0-9])\.){3}(25[0-5]|2[0-4][0-9]|1[0-9]{2}|[1-9]?[0-9]))$/;

const IPV6_MAX = (BigInt(1) << BigInt(128)) - BigInt(1);

export interface CidrRange {
  start: string;
  end: string;
  version: 4 | 6;
}

/**
 * Utility functions for validating and converting IP addresses
 */
export class IpUtil {
  /**
   * Validate IPv4 address
   * @param ip - IP address to validate
   * @returns boolean indicating if the IP is a valid IPv4 address
   */
  static isValidIpv4(ip: string): boolean {
    return IPV4_PATTERN.test(ip);
  }

  /**
   * Validate IPv6 address
   * @param ip - IP address to validate
   * @returns boolean indicating if the IP is a valid IPv6 address
   */
  static isValidIpv6(ip: string): boolean {
    return IPV6_PATTERN.test(ip);
  }

  /**
   * Determine the IP version of an address
   * @returns 4, 6, or null when the string is not an address
   */
  static getIpVersion(ip: string): 4 | 6 | null {
    if (this.isValidIpv4(ip)) return 4;
    if (this.isValidIpv6(ip)) return 6;
    return null;
  }

  static isValidIp(ip: string): boolean {
    return this.getIpVersion(ip) !== null;
  }

  /**
   * Convert an IPv4 address to a 32-bit unsigned integer
   * Example: "192.168.1.1" -> 3232235777
   */
  static ipToLong(ip: string): number {
    // Shift each octet in, then force unsigned
    return (
      ip
        .split(".")
        .reduce((acc, octet) => (acc << 8) + parseInt(octet, 10), 0) >>> 0
    );
  }

  /**
   * Convert a 32-bit unsigned integer back to dotted-quad form
   * Example: 3232235777 -> "192.168.1.1"
   */
  static longToIp(long: number): string {
    return [
      (long >>> 24) & 255,
      (long >>> 16) & 255,
      (long >>> 8) & 255,
      long & 255,
    ].join(".");
  }

  /**
   * Expand an IPv6 address into its eight 16-bit groups.
   * A trailing dotted quad (e.g. ::ffff:10.0.0.1) counts as two groups.
   */
  static expandIpv6(ip: string): number[] {
    // Drop any zone index
    const address = ip.split("%")[0];
    let tail: number[] = [];
    let head = address;

    // Embedded IPv4 tail becomes the last two groups
    const lastColon = address.lastIndexOf(":");
    const lastGroup = address.slice(lastColon + 1);
    if (lastGroup.includes(".")) {
      if (!this.isValidIpv4(lastGroup)) {
        throw new Error(`Invalid IPv6 address: ${ip}`);
      }
      const long = this.ipToLong(lastGroup);
      tail = [long >>> 16, long & 0xffff];
      head = address.slice(0, lastColon + 1);
      if (head.endsWith(":") && !head.endsWith("::")) {
        head = head.slice(0, -1);
      }
    }

    // At most one "::" may stand for the missing groups
    const halves = head.split("::");
    if (halves.length > 2) {
      throw new Error(`Invalid IPv6 address: ${ip}`);
    }

    const toGroups = (part: string): number[] =>
      part === "" ? [] : part.split(":").map((group) => parseInt(group, 16));

    const left = toGroups(halves[0]);
    const right = [...(halves.length === 2 ? toGroups(halves[1]) : []), ...tail];
    const missing = 8 - left.length - right.length;

    if (halves.length === 1 ? missing !== 0 : missing < 1) {
      throw new Error(`Invalid IPv6 address: ${ip}`);
    }

    const groups = [...left, ...new Array<number>(missing).fill(0), ...right];
    if (groups.some((group) => isNaN(group) || group < 0 || group > 0xffff)) {
      throw new Error(`Invalid IPv6 address: ${ip}`);
    }

    return groups;
  }

  /**
   * Convert an IPv6 address to a 128-bit BigInt
   */
  static ipv6ToBigInt(ip: string): bigint {
    return this.expandIpv6(ip).reduce(
      (acc, group) => (acc << BigInt(16)) | BigInt(group),
      BigInt(0)
    );
  }

  /**
   * Convert a 128-bit BigInt to an uncompressed IPv6 address
   * Example: 1n -> "0:0:0:0:0:0:0:1"
   */
  static bigIntToIpv6(value: bigint): string {
    if (value < BigInt(0) || value > IPV6_MAX) {
      throw new Error(`BigInt value out of range for IPv6: ${value}`);
    }

    // Extract 16-bit groups, most significant first
    const groups: string[] = [];
    for (let shift = 112; shift >= 0; shift -= 16) {
      groups.push(((value >> BigInt(shift)) & BigInt(0xffff)).toString(16));
    }
    return groups.join(":");
  }

  /**
   * Parse CIDR notation (e.g. "192.168.1.0/24" or "2001:db8::/32")
   * @returns first and last address of the network, or null if malformed
   */
  static parseCidr(cidr: string): CidrRange | null {
    const [ip, prefixText, ...rest] = cidr.trim().split("/");
    if (rest.length > 0 || prefixText === undefined) return null;
    if (!/^\d{1,3}$/.test(prefixText)) return null;
    const prefix = Number(prefixText);

    const version = this.getIpVersion(ip);
    if (version === 4) {
      if (prefix > 32) return null;
      // Round down to the network boundary
      const hostBits = 32 - prefix;
      const size = 2 ** hostBits;
      const start = Math.floor(this.ipToLong(ip) / size) * size;
      return {
        start: this.longToIp(start),
        end: this.longToIp(start + size - 1),
        version,
      };
    }

    if (version === 6) {
      if (prefix > 128) return null;
      // Host bits cleared for the start, set for the end
      const mask = (BigInt(1) << BigInt(128 - prefix)) - BigInt(1);
      const value = this.ipv6ToBigInt(ip);
      return {
        start: this.bigIntToIpv6(value & ~mask & IPV6_MAX),
        end: this.bigIntToIpv6(value | mask),
        version,
      };
    }

    return null;
  }
}
