import type { Kysely } from "kysely";
import type { Database } from "../../src/config/db.js";
import { InfrastructureError, SearchErrorCode } from "../errors.js";
import type { DateRange, IngestionStatus } from "../search/types.js";

/**
 * Ingestion status from the `ingestion_runs` table. A range counts as ingested
 * when a COMPLETED run covers it and no run overlapping it is still RUNNING.
 */
export class KyselyIngestionStatus implements IngestionStatus {
  constructor(private readonly db: Kysely<Database>) {}

  async isComplete(dateRange: DateRange): Promise<boolean> {
    try {
      return await this.check(dateRange);
    } catch (err) {
      throw new InfrastructureError(
        SearchErrorCode.SCHEDULE_UNAVAILABLE,
        `ingestion status query failed: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }
  }

  private async check(dateRange: DateRange): Promise<boolean> {
    const running = await this.db
      .selectFrom("ingestion_runs")
      .select("ingestion_id")
      .where("status", "=", "RUNNING")
      .where("range_start", "<=", dateRange.end)
      .where("range_end", ">=", dateRange.start)
      .limit(1)
      .executeTakeFirst();
    if (running) return false;

    const covering = await this.db
      .selectFrom("ingestion_runs")
      .select("ingestion_id")
      .where("status", "=", "COMPLETED")
      .where("range_start", "<=", dateRange.start)
      .where("range_end", ">=", dateRange.end)
      .limit(1)
      .executeTakeFirst();
    return covering !== undefined;
  }
}
