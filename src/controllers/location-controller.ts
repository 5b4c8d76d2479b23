import { randomUUID } from "crypto";
import { NextFunction, Request, Response, Router } from "express";
import { z } from "zod";
import { LocationConfig } from "../config/location-config";
import { DriverFactory } from "../services/driver-factory";
import { IpResolver } from "../services/ip-resolver";
import { LocationService } from "../services/location-service";
import { Session, SessionProvider } from "../sessions/session";

export const SESSION_HEADER = "x-session-id";

export interface LocationControllerDeps {
  config: LocationConfig;
  drivers: DriverFactory;
  sessions: SessionProvider;
}

const lookupQuery = z.object({
  ip: z.string().optional(),
  field: z.string().min(1).optional(),
});

const listField = z.enum(["countryCode", "countryName"]).optional();
const countriesQuery = z.object({ value: listField, name: listField });

/**
 * Finds the visitor's session from the X-Session-Id header, starting a
 * new one (and echoing its id back) when the header is absent.
 */
function sessionFor(
  req: Request,
  res: Response,
  sessions: SessionProvider
): Session {
  const header = req.header(SESSION_HEADER);
  const sessionId = header && header.length > 0 ? header : randomUUID();
  res.setHeader(SESSION_HEADER, sessionId);
  return sessions.forSession(sessionId);
}

export function createLocationRoutes(deps: LocationControllerDeps): Router {
  const router = Router();

  const serviceFor = (req: Request, res: Response): LocationService =>
    new LocationService({
      config: deps.config,
      drivers: deps.drivers,
      session: sessionFor(req, res, deps.sessions),
      ipResolver: new IpResolver(deps.config, {
        headers: req.headers,
        remoteAddress: req.socket.remoteAddress,
        env: process.env,
      }),
    });

  // GET /api/location?ip=x.x.x.x&field=countryCode
  router.get("/", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = lookupQuery.safeParse(req.query);
      if (!query.success) {
        return res.status(400).json({ error: "Invalid query parameters" });
      }

      const { ip, field } = query.data;
      const service = serviceFor(req, res);

      if (field) {
        const value = await service.get(ip, field);
        return res.status(200).json({ field, value });
      }

      return res.status(200).json(await service.get(ip));
    } catch (error) {
      next(error);
    }
  });

  // GET /api/location/is/US
  router.get(
    "/is/:value",
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const value = req.params.value;
        const match = await serviceFor(req, res).is(value);
        return res.status(200).json({ value, match });
      } catch (error) {
        next(error);
      }
    }
  );

  // GET /api/location/countries?value=countryCode&name=countryName
  router.get(
    "/countries",
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const query = countriesQuery.safeParse(req.query);
        if (!query.success) {
          return res.status(400).json({
            error: "value and name must be countryCode or countryName",
          });
        }

        const list = serviceFor(req, res).lists(
          query.data.value,
          query.data.name
        );
        return res.status(200).json(list);
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}
