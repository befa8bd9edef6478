import { loadConfig } from "./config/env.js";
import { createLogger } from "./config/logger.js";
import { createDb } from "./config/db.js";
import { buildApp } from "./app.js";
import { CacheCoordinator } from "../services/cache/cache.coordinator.js";
import { PgScheduleStore } from "../services/queries/legs.query.js";
import { KyselyIngestionStatus } from "../services/queries/ingestion.query.js";
import { ConnectionResolver } from "../services/search/connection.resolver.js";
import { SearchCoordinator } from "../services/search/search.service.js";

const config = loadConfig();
const logger = createLogger(config);
const db = createDb();
const store = new PgScheduleStore();

const search = new SearchCoordinator({
  resolver: new ConnectionResolver(store, logger, config.resolver),
  cache: new CacheCoordinator({ ttlMs: config.cache.ttlMs, maxEntries: config.cache.maxEntries, logger }),
  store,
  logger,
  ingestion: new KyselyIngestionStatus(db),
  rules: config.validation,
  partialTtlMs: config.cache.partialTtlMs,
});

const app = await buildApp({ search, logger, db });

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "shutting down");
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        app.log.error({ err }, "error during shutdown");
        process.exit(1);
      }
    );
  });
}

try {
  await app.listen({ port: config.port, host: config.host });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
