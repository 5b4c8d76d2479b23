import { RedisStore } from "../services/redis-client";
import { DriverConstructor } from "./driver";
import { IpApiDriver } from "./ip-api-driver";
import { MaxMindDriver } from "./maxmind-driver";
import { RedisRangeDriver } from "./redis-range-driver";

export type { Driver, DriverConstructor } from "./driver";
export { IpApiDriver } from "./ip-api-driver";
export { MaxMindDriver } from "./maxmind-driver";
export { RedisRangeDriver } from "./redis-range-driver";

/**
 * Drivers shipped with the service, by name. `redis` is only called
 * when the RedisRange driver is actually created.
 */
export function builtinDrivers(
  redis: () => RedisStore
): Record<string, DriverConstructor> {
  return {
    MaxMind: (config) => MaxMindDriver.fromConfig(config),
    IpApi: (config) => IpApiDriver.fromConfig(config),
    RedisRange: () => new RedisRangeDriver(redis()),
  };
}
