import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError } from "../errors/location-errors";

export type CountryListField = "countryCode" | "countryName";

export interface CountryEntry {
  countryCode: string;
  countryName: string;
}

export interface LocationConfig {
  port: number;
  selectedDriver: string;
  fallbackDrivers: string[];
  driverNamespace: string;
  localhostTesting: boolean;
  localhostTestingIp: string;
  localhostForgetLocation: boolean;
  defaultIp: string;
  dropdown: { value: CountryListField; name: CountryListField };
  countryCodes: CountryEntry[];
  maxmind: { databasePath: string };
  ipApi: { url: string; timeoutMs: number };
  redis: { host: string; port: number };
  session: { store: "memory" | "redis"; ttlSeconds: number };
}

const DEFAULT_COUNTRY_CODES_PATH = path.resolve(
  process.cwd(),
  "data",
  "country-codes.json"
);

const flag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const listField = z.enum(["countryCode", "countryName"]);

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  LOCATION_DRIVER: z.string().min(1).default("MaxMind"),
  LOCATION_FALLBACKS: z
    .string()
    .default("IpApi,RedisRange")
    .transform((value) =>
      value
        .split(",")
        .map((name) => name.trim())
        .filter((name) => name.length > 0)
    ),
  LOCATION_DRIVER_NAMESPACE: z.string().default("location.drivers."),
  LOCATION_LOCALHOST_TESTING: flag,
  LOCATION_LOCALHOST_TESTING_IP: z.string().min(1).default("66.102.0.0"),
  LOCATION_LOCALHOST_FORGET: flag,
  LOCATION_DEFAULT_IP: z.string().min(1).default("0.0.0.0"),
  LOCATION_DROPDOWN_VALUE: listField.default("countryCode"),
  LOCATION_DROPDOWN_NAME: listField.default("countryName"),
  MAXMIND_DB_PATH: z.string().min(1).default("data/GeoLite2-City.mmdb"),
  IPAPI_URL: z.string().url().default("http://ip-api.com/json/"),
  IPAPI_TIMEOUT_MS: z.coerce.number().int().positive().default(3000),
  REDIS_HOST: z.string().min(1).default("localhost"),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  SESSION_STORE: z.enum(["memory", "redis"]).default("memory"),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(7200),
});

const countryCodesSchema = z.array(
  z.object({ countryCode: z.string(), countryName: z.string() })
);

/**
 * Read the country-code table shipped in data/.
 */
export function loadCountryCodes(
  filePath: string = DEFAULT_COUNTRY_CODES_PATH
): CountryEntry[] {
  const result = countryCodesSchema.safeParse(
    JSON.parse(fs.readFileSync(filePath, "utf8"))
  );

  if (!result.success) {
    throw new ConfigError([`${filePath}: ${result.error.message}`]);
  }

  return result.data;
}

/**
 * Build the location configuration from environment variables.
 * Empty variables count as unset.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  countryCodes: CountryEntry[] = loadCountryCodes()
): LocationConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const result = envSchema.safeParse(present);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`
      )
    );
  }

  const vars = result.data;

  return {
    port: vars.PORT,
    selectedDriver: vars.LOCATION_DRIVER,
    fallbackDrivers: vars.LOCATION_FALLBACKS,
    driverNamespace: vars.LOCATION_DRIVER_NAMESPACE,
    localhostTesting: vars.LOCATION_LOCALHOST_TESTING,
    localhostTestingIp: vars.LOCATION_LOCALHOST_TESTING_IP,
    localhostForgetLocation: vars.LOCATION_LOCALHOST_FORGET,
    defaultIp: vars.LOCATION_DEFAULT_IP,
    dropdown: {
      value: vars.LOCATION_DROPDOWN_VALUE,
      name: vars.LOCATION_DROPDOWN_NAME,
    },
    countryCodes,
    maxmind: { databasePath: vars.MAXMIND_DB_PATH },
    ipApi: { url: vars.IPAPI_URL, timeoutMs: vars.IPAPI_TIMEOUT_MS },
    redis: { host: vars.REDIS_HOST, port: vars.REDIS_PORT },
    session: { store: vars.SESSION_STORE, ttlSeconds: vars.SESSION_TTL_SECONDS },
  };
}
