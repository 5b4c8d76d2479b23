import dotenv from "dotenv";
import { createApp } from "./app";
import { loadConfig } from "./config/location-config";
import { builtinDrivers } from "./drivers";
import { DriverFactory } from "./services/driver-factory";
import { RedisClient } from "./services/redis-client";
import { MemorySessionProvider } from "./sessions/memory-session";
import { RedisSessionProvider } from "./sessions/redis-session";
import { SessionProvider } from "./sessions/session";

// Load environment variables from .env
dotenv.config();

const config = loadConfig();

let redis: RedisClient | null = null;
const redisClient = (): RedisClient => {
  if (!redis) {
    redis = new RedisClient(config.redis.host, config.redis.port);
  }
  return redis;
};

const sessions: SessionProvider =
  config.session.store === "redis"
    ? new RedisSessionProvider(redisClient(), config.session.ttlSeconds)
    : new MemorySessionProvider(config.session.ttlSeconds);

const drivers = new DriverFactory(config, builtinDrivers(redisClient));

// Fail fast on a misspelled driver name
for (const name of [config.selectedDriver, ...config.fallbackDrivers]) {
  if (!drivers.has(name)) {
    console.error(`Unknown location driver configured: ${name}`);
    process.exit(1);
  }
}

const app = createApp({ config, drivers, sessions });

const server = app.listen(config.port, () => {
  console.log(`Server is running on port ${config.port}`);
  console.log(`Driver: ${config.selectedDriver}, fallbacks: ${config.fallbackDrivers.join(", ") || "none"}`);
  console.log(`API endpoints:`);
  console.log(`- GET http://localhost:${config.port}/api/location?ip={ip_address}&field={field}`);
  console.log(`- GET http://localhost:${config.port}/api/location/is/{value}`);
  console.log(`- GET http://localhost:${config.port}/api/location/countries`);
  console.log(`- GET http://localhost:${config.port}/health`);
});

// Listen for termination signals to close connections
process.on("SIGTERM", () => void shutdown());
process.on("SIGINT", () => void shutdown());

async function shutdown(): Promise<void> {
  console.log("Shutting down gracefully...");
  server.close();

  try {
    if (redis) {
      await redis.disconnect();
      console.log("Redis connection closed");
    }
  } catch (err) {
    console.error("Error during shutdown:", err);
  }

  process.exit(0);
}
