/**
 * Errors raised while resolving a visitor's location.
 *
 * Driver failures are not errors: drivers report them through the
 * `error` flag on the location record. Only the cases below are thrown.
 */
export class LocationError extends Error {
  readonly details: Record<string, unknown> | undefined;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** An explicit IP address that is neither IPv4 nor IPv6. */
export class InvalidAddressError extends LocationError {
  constructor(readonly address: string) {
    super(`The IP address: ${address} is invalid`, { address });
  }
}

export class DriverNotFoundError extends LocationError {
  constructor(readonly driver: string) {
    super(
      `The driver: ${driver}, does not exist. Check that it is registered and spelled correctly.`,
      { driver }
    );
  }
}

/** Every configured driver reported an error for the same address. */
export class NoDriverAvailableError extends LocationError {
  constructor(readonly lastDriver: string) {
    super(
      `No location drivers are available. Last driver tried was: ${lastDriver}.`,
      { lastDriver }
    );
  }
}

export class FieldNotFoundError extends LocationError {
  constructor(readonly field: string) {
    super(
      `Location field: ${field} does not exist on the resolved location.`,
      { field }
    );
  }
}

export class ConfigError extends LocationError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
}
