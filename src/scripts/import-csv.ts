import path from "path";
import dotenv from "dotenv";
import { loadConfig } from "../config/location-config";
import { CsvImportService } from "../services/csv-import-service";
import { RedisClient } from "../services/redis-client";

dotenv.config();

function printUsage(): void {
  console.log("Usage: npm run import -- [--clear] <file.csv>");
  console.log("");
  console.log("Options:");
  console.log("  --clear, -c   Delete existing ranges before importing");
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const clear = args.includes("--clear") || args.includes("-c");
  const files = args.filter((arg) => !arg.startsWith("-"));

  if (args.includes("--help") || args.includes("-h") || files.length === 0) {
    printUsage();
    process.exitCode = files.length === 0 && !args.includes("--help") && !args.includes("-h") ? 1 : 0;
    return;
  }

  const config = loadConfig();
  const redis = new RedisClient(config.redis.host, config.redis.port);
  const importer = new CsvImportService(redis);

  try {
    if (clear) {
      await importer.clear();
    }
    for (const file of files) {
      await importer.importFile(path.resolve(process.cwd(), file));
    }
  } finally {
    await redis.disconnect();
  }
}

main().catch((error) => {
  console.error("Import failed:", error);
  process.exit(1);
});
