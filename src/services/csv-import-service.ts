import fs from "fs";
import csv from "csv-parser";
import { z } from "zod";
import { IpUtil } from "./ip-util";
import { RangeSearchUtil } from "./range-search-util";
import { RedisStore } from "./redis-client";

const rowSchema = z.object({
  network: z.string(),
  country_code: z.string().default(""),
  country_name: z.string().default(""),
  region_name: z.string().default(""),
  city_name: z.string().default(""),
  postal_code: z.string().default(""),
  latitude: z.string().default(""),
  longitude: z.string().default(""),
});

export type RangeRow = z.infer<typeof rowSchema>;

export interface ImportSummary {
  ipv4: number;
  ipv6: number;
  skipped: number;
}

/**
 * Loads network ranges from CSV into Redis in the layout the RedisRange
 * driver reads.
 *
 * Expected header:
 * network,country_code,country_name,region_name,city_name,postal_code,latitude,longitude
 */
export class CsvImportService {
  constructor(private readonly store: RedisStore) {}

  async importFile(filePath: string): Promise<ImportSummary> {
    const summary: ImportSummary = { ipv4: 0, ipv6: 0, skipped: 0 };

    const rows = fs.createReadStream(filePath).pipe(csv());
    for await (const raw of rows) {
      const version = await this.importRow(raw);
      if (version === 4) summary.ipv4++;
      else if (version === 6) summary.ipv6++;
      else summary.skipped++;
    }

    console.log(
      `Imported ${summary.ipv4} IPv4 and ${summary.ipv6} IPv6 ranges from ${filePath} (${summary.skipped} skipped)`
    );
    return summary;
  }

  /**
   * Store one row; returns the IP version stored, or null when skipped.
   */
  async importRow(raw: unknown): Promise<4 | 6 | null> {
    const parsed = rowSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn("Skipping row without a network column");
      return null;
    }

    const row = parsed.data;
    const range = IpUtil.parseCidr(row.network);
    if (!range) {
      console.warn(`Skipping row with invalid network: ${row.network}`);
      return null;
    }

    const key =
      range.version === 4
        ? RangeSearchUtil.ipv4Key(
            IpUtil.ipToLong(range.start),
            IpUtil.ipToLong(range.end)
          )
        : RangeSearchUtil.ipv6Key(
            IpUtil.ipv6ToBigInt(range.start),
            IpUtil.ipv6ToBigInt(range.end)
          );

    await this.store.hSet(key, {
      startIp: range.start,
      endIp: range.end,
      countryCode: row.country_code,
      countryName: row.country_name,
      regionName: row.region_name,
      cityName: row.city_name,
      postalCode: row.postal_code,
      latitude: row.latitude,
      longitude: row.longitude,
    });

    return range.version;
  }

  /**
   * Remove every imported range. Returns the number of keys deleted.
   */
  async clear(): Promise<number> {
    const keys = await this.store.scanKeys("geoip:*:range:*");
    for (const key of keys) {
      await this.store.del(key);
    }
    console.log(`Cleared ${keys.length} range keys from Redis`);
    return keys.length;
  }
}
