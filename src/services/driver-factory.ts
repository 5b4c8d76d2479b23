import { LocationConfig } from "../config/location-config";
import { Driver, DriverConstructor } from "../drivers/driver";
import { DriverNotFoundError } from "../errors/location-errors";

/**
 * Creates drivers by name. Names are prefixed with the configured
 * namespace and looked up case-sensitively; each driver is constructed
 * once per factory and reused.
 */
export class DriverFactory {
  private readonly registry = new Map<string, DriverConstructor>();
  private readonly instances = new Map<string, Driver>();

  constructor(
    private readonly config: LocationConfig,
    drivers: Record<string, DriverConstructor> = {}
  ) {
    for (const [name, construct] of Object.entries(drivers)) {
      this.register(name, construct);
    }
  }

  register(name: string, construct: DriverConstructor): void {
    const id = this.identify(name);
    this.registry.set(id, construct);
    this.instances.delete(id);
  }

  has(name: string): boolean {
    return this.registry.has(this.identify(name));
  }

  create(name: string): Driver {
    const id = this.identify(name);

    const existing = this.instances.get(id);
    if (existing) {
      return existing;
    }

    const construct = this.registry.get(id);
    if (!construct) {
      throw new DriverNotFoundError(name);
    }

    const driver = construct(this.config);
    this.instances.set(id, driver);
    return driver;
  }

  private identify(name: string): string {
    return `${this.config.driverNamespace}${name}`;
  }
}
