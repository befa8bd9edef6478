import { Kysely, PostgresDialect, type ColumnType, type Generated } from "kysely";
import { getPool } from "../../database/index.js";

export interface FlightLegsTable {
  flight_id: string;
  airline_id: string;
  flight_number: string;
  origin: string;
  destination: string;
  departure_time: ColumnType<Date, Date | string, Date | string>;
  arrival_time: ColumnType<Date, Date | string, Date | string>;
}

export interface SeatAvailabilityTable {
  flight_id: string;
  seat_class: string;
  available_seats: number;
}

export interface IngestionRunsTable {
  ingestion_id: string;
  range_start: ColumnType<Date | string, string, string>;
  range_end: ColumnType<Date | string, string, string>;
  status: "RUNNING" | "COMPLETED" | "FAILED";
  started_at: Generated<Date>;
  last_updated: Generated<Date>;
}

export interface Database {
  flight_legs: FlightLegsTable;
  seat_availability: SeatAvailabilityTable;
  ingestion_runs: IngestionRunsTable;
}

/** Kysely over the shared pg pool; destroying it ends that pool. */
export function createDb(): Kysely<Database> {
  return new Kysely<Database>({
    dialect: new PostgresDialect({
      pool: getPool(),
    }),
  });
}
