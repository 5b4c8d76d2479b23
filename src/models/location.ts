import { z } from "zod";

/**
 * Schema of a resolved location. Only `error` is mandatory; the other
 * attributes depend on what the driver's data source provides.
 */
export const locationSchema = z
  .object({
    error: z.boolean(),
    ip: z.string().optional(),
    driver: z.string().optional(),
    countryCode: z.string().optional(),
    countryName: z.string().optional(),
    regionCode: z.string().optional(),
    regionName: z.string().optional(),
    cityName: z.string().optional(),
    zipCode: z.string().optional(),
    postalCode: z.string().optional(),
    isoCode: z.string().optional(),
    latitude: z.number().optional(),
    longitude: z.number().optional(),
    metroCode: z.string().optional(),
    areaCode: z.string().optional(),
    timezone: z.string().optional(),
    isp: z.string().optional(),
  })
  .strict();

export type LocationFields = z.infer<typeof locationSchema>;

export type LocationRecord = Readonly<LocationFields>;

export type LocationField = keyof LocationFields;

export type LocationValue = NonNullable<LocationFields[LocationField]>;

/**
 * Build a frozen location record. Attributes passed as `undefined` or
 * `null` are left out so that a missing attribute is not a key at all.
 */
export function createLocation(fields: {
  [K in keyof LocationFields]?: LocationFields[K] | null;
}): LocationRecord {
  const record: Record<string, unknown> = { error: fields.error ?? false };

  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined && value !== null) {
      record[key] = value;
    }
  }

  return Object.freeze(locationSchema.parse(record));
}

/**
 * Record returned by a driver that could not locate the address.
 */
export function erroredLocation(ip: string, driver: string): LocationRecord {
  return createLocation({ error: true, ip, driver });
}

/**
 * Parse a value read back from a session store.
 */
export function parseLocation(value: unknown): LocationRecord | null {
  const result = locationSchema.safeParse(value);
  return result.success ? Object.freeze(result.data) : null;
}

export function hasLocationField(
  location: LocationRecord,
  field: string
): field is LocationField {
  return Object.prototype.hasOwnProperty.call(location, field);
}
