import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createDb, createMemPool, createPgPool, type StorageMode } from "./db/connection.js";
import { applySqlFile } from "./db/bootstrap.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { AppConfig } from "./config/appConfig.js";
import { createLogger } from "./core/logger.js";
import { buildServices } from "./services.js";

async function main(): Promise<void> {
  const configPath = process.env.RUN_LEDGER_CONFIG ?? "config/default.config.yaml";
  const databaseUrl = process.env.DATABASE_URL;
  const autoSchema = (process.env.AUTO_SCHEMA ?? "true").toLowerCase() !== "false";

  const logger = createLogger();
  const config = await AppConfig.loadFromFile(configPath);
  const pool = databaseUrl ? createPgPool(databaseUrl) : createMemPool();
  if (!databaseUrl || autoSchema) {
    await applySqlFile(pool, "db/schema.sql");
  }

  const storageMode: StorageMode = databaseUrl ? "postgres" : "pg-mem";
  const db = createDb(pool);
  const services = buildServices({ db, config, logger });
  const server = createGatewayServer({ config, logger, storageMode, ...services });
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ mode: storageMode, tracker: services.reconciler !== null }, "run-ledger gateway ready");
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
