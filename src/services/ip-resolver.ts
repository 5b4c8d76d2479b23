import { IncomingHttpHeaders } from "http";
import { LocationConfig } from "../config/location-config";
import { InvalidAddressError } from "../errors/location-errors";
import { IpUtil } from "./ip-util";

/**
 * What the resolver can see of the current request.
 */
export interface RequestContext {
  headers: IncomingHttpHeaders;
  remoteAddress?: string;
  env: NodeJS.ProcessEnv;
}

/**
 * A named place the client address may be found in.
 */
export interface IpSource {
  name: string;
  read(context: RequestContext): string | undefined;
}

export type IpResolverConfig = Pick<
  LocationConfig,
  "localhostTesting" | "localhostTestingIp" | "defaultIp"
>;

function header(name: string): IpSource {
  return {
    name: `header:${name}`,
    read: ({ headers }) => {
      const value = headers[name];
      return Array.isArray(value) ? value[0] : value;
    },
  };
}

/**
 * Client-asserted headers come before proxy headers, which come before
 * the address of the socket itself.
 */
export const DEFAULT_IP_SOURCES: readonly IpSource[] = [
  header("client-ip"),
  header("x-forwarded-for"),
  header("x-forwarded"),
  header("forwarded-for"),
  header("forwarded"),
  { name: "env:REMOTE_ADDR", read: ({ env }) => env.REMOTE_ADDR },
  { name: "socket", read: ({ remoteAddress }) => remoteAddress },
];

/**
 * Decides which IP address a lookup is made for.
 */
export class IpResolver {
  constructor(
    private readonly config: IpResolverConfig,
    private readonly context: RequestContext,
    private readonly sources: readonly IpSource[] = DEFAULT_IP_SOURCES
  ) {}

  /**
   * An explicit address is validated and returned. Without one, the
   * address is detected from the request, unvalidated.
   */
  resolve(explicitIp?: string): string {
    if (explicitIp) {
      if (!IpUtil.isValidIp(explicitIp)) {
        throw new InvalidAddressError(explicitIp);
      }
      return explicitIp;
    }

    return this.detect();
  }

  private detect(): string {
    if (this.config.localhostTesting) {
      return this.config.localhostTestingIp;
    }

    for (const source of this.sources) {
      const value = source.read(this.context);
      if (value) {
        return value;
      }
    }

    return this.config.defaultIp;
  }
}
