import { LocationConfig } from "../config/location-config";
import { LocationRecord } from "../models/location";

/**
 * A location backend. `get` never rejects for a lookup that merely
 * failed: it resolves to a record with `error: true` instead.
 */
export interface Driver {
  readonly name: string;
  get(ip: string): Promise<LocationRecord>;
}

export type DriverConstructor = (config: LocationConfig) => Driver;
