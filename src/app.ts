import Fastify from "fastify";
import { sql, type Kysely } from "kysely";
import type { Logger } from "pino";
import { InfrastructureError, SearchAbortedError, SearchValidationError } from "../services/errors.js";
import type { SearchCoordinator } from "../services/search/search.service.js";
import type { Database } from "./config/db.js";
import { ingestionComplete, invalidate, refresh } from "./modules/cache.controller.js";
import { getFlight, search } from "./modules/search.controller.js";
import { dbPlugin } from "./plugins/db.plugin.js";

export interface AppDeps {
  search: SearchCoordinator;
  logger: Logger;
  /** Optional so tests can run without a database. */
  db?: Kysely<Database>;
}

/** Seconds a client should wait before retrying after a schedule-store outage. */
const RETRY_AFTER_SECONDS = 5;

export async function buildApp(deps: AppDeps) {
  const fastify = Fastify({
    loggerInstance: deps.logger,
  });

  if (deps.db) {
    await fastify.register(dbPlugin, { db: deps.db });
  }

  fastify.setErrorHandler<Error>(function (err, request, reply) {
    if (err instanceof InfrastructureError) {
      request.log.warn({ err, code: err.code }, "schedule store unavailable");
      if (err.retryable) reply.header("retry-after", String(RETRY_AFTER_SECONDS));
      return reply.status(503).send({ error: err.message, code: err.code, retryable: err.retryable });
    }
    if (err instanceof SearchValidationError) {
      return reply.status(400).send({ error: "Invalid search parameters", code: err.code, errors: err.issues });
    }
    if (err instanceof SearchAbortedError) {
      request.log.info("client went away before the search finished");
      return reply.status(499).send({ error: err.message, code: err.code });
    }
    request.log.error({ err }, "unhandled error");
    return reply.status(500).send({ error: "Internal server error" });
  });

  fastify.get("/health", async function () {
    let database: "ok" | "unavailable" | "not configured" = "not configured";
    if (fastify.hasDecorator("db")) {
      try {
        await sql`select 1`.execute(fastify.db);
        database = "ok";
      } catch (err) {
        fastify.log.warn({ err }, "database health check failed");
        database = "unavailable";
      }
    }
    return { status: "ok", database, cache: deps.search.cacheStats() };
  });

  fastify.get("/search", async function (request, reply) {
    // A client disconnect abandons this caller's wait; shared work carries on.
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableEnded) controller.abort();
    };
    reply.raw.once("close", onClose);

    try {
      const result = await search(deps.search, request.query, controller.signal);
      return reply.status(result.status).send(result.body);
    } finally {
      reply.raw.off("close", onClose);
    }
  });

  fastify.get("/flights/:flightId", async function (request, reply) {
    const result = await getFlight(deps.search, request.params);
    return reply.status(result.status).send(result.body);
  });

  fastify.post("/cache/invalidate", async function (request, reply) {
    const result = await invalidate(deps.search, request.body);
    return reply.status(result.status).send(result.body);
  });

  fastify.post("/cache/refresh", async function (request, reply) {
    const result = await refresh(deps.search, request.body);
    return reply.status(result.status).send(result.body);
  });

  fastify.post("/cache/ingestion-complete", async function (request, reply) {
    const result = await ingestionComplete(deps.search, request.body);
    return reply.status(result.status).send(result.body);
  });

  return fastify;
}
