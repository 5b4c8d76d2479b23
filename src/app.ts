import express from "express";
import {
  createLocationRoutes,
  LocationControllerDeps,
} from "./controllers/location-controller";
import {
  FieldNotFoundError,
  InvalidAddressError,
  LocationError,
  NoDriverAvailableError,
} from "./errors/location-errors";

function statusFor(err: Error): number {
  if (err instanceof InvalidAddressError) return 400;
  if (err instanceof FieldNotFoundError) return 400;
  if (err instanceof NoDriverAvailableError) return 503;
  return 500;
}

export function createApp(deps: LocationControllerDeps): express.Express {
  const app = express();

  // Middleware
  app.use(express.json());

  // Routes
  app.use("/api/location", createLocationRoutes(deps));

  // Health check endpoint
  app.get("/health", (req, res) => {
    res.status(200).json({ status: "UP" });
  });

  // Error handling middleware
  app.use(
    (
      err: Error,
      req: express.Request,
      res: express.Response,
      // Express recognises error handlers by their four parameters
      next: express.NextFunction
    ) => {
      const status = statusFor(err);

      if (status >= 500) {
        console.error(err.stack);
      }

      if (err instanceof LocationError && status !== 500) {
        res.status(status).json({ error: err.message, type: err.name });
        return;
      }

      res.status(status).json({ error: "Internal Server Error" });
    }
  );

  return app;
}
