// Database — scoped knex instance and the stock_data table.

import { Context, Effect, Layer, Option, Redacted } from "effect";
import { knex, type Knex } from "knex";
import { type DatabaseSettings, PipelineConfig } from "./config.ts";

export const STOCK_DATA_TABLE = "stock_data";

export class Database extends Context.Tag("Database")<Database, Knex>() {}

/** knex settings for the PostgreSQL store. Nothing connects until the first
 *  query. */
export function postgresConfig(settings: DatabaseSettings): Knex.Config {
  return {
    client: "pg",
    connection: {
      host: settings.host,
      port: settings.port,
      database: settings.database,
      user: settings.user,
      password: Option.match(settings.password, {
        onNone: () => undefined,
        onSome: Redacted.value,
      }),
      connectionTimeoutMillis: 10_000,
    },
    pool: { min: 0, max: 2 },
  };
}

export function makeDatabaseLayer(config: Knex.Config): Layer.Layer<Database> {
  return Layer.scoped(
    Database,
    Effect.acquireRelease(
      Effect.sync(() => knex(config)),
      (db) =>
        Effect.promise(() => db.destroy()).pipe(
          Effect.zipRight(Effect.logDebug("Database connection closed")),
        ),
    ),
  );
}

export const DatabaseLive = Layer.unwrapEffect(
  Effect.map(PipelineConfig, (config) =>
    makeDatabaseLayer(postgresConfig(config.database)),
  ),
);

/** Create stock_data when it does not exist yet. */
export async function ensureSchema(db: Knex): Promise<void> {
  if (await db.schema.hasTable(STOCK_DATA_TABLE)) return;

  await db.schema.createTable(STOCK_DATA_TABLE, (table) => {
    table.increments("id");
    table.string("symbol", 10).notNullable();
    table.date("date").notNullable();
    table.decimal("open_price", 10, 4);
    table.decimal("high_price", 10, 4);
    table.decimal("low_price", 10, 4);
    table.decimal("close_price", 10, 4).notNullable();
    table.bigInteger("volume");
    table.timestamp("created_at", { useTz: true }).defaultTo(db.fn.now());
    table.timestamp("updated_at", { useTz: true }).defaultTo(db.fn.now());
    table.unique(["symbol", "date"]);
  });
}
