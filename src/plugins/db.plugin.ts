import fp from "fastify-plugin";
import type { Kysely } from "kysely";
import type { Database } from "../config/db.js";

declare module "fastify" {
  interface FastifyInstance {
    db: Kysely<Database>;
  }
}

/** Exposes the Kysely instance as `app.db` and ends the shared pool when the app closes. */
export const dbPlugin = fp<{ db: Kysely<Database> }>(async function dbPlugin(app, opts) {
  app.decorate("db", opts.db);

  app.addHook("onClose", async () => {
    await opts.db.destroy();
  });
});
