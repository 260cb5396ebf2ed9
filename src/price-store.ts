// Price store — idempotent upsert of a run's records.

import { Clock, Context, Data, Effect, Layer } from "effect";
import { Database, ensureSchema, STOCK_DATA_TABLE } from "./database.ts";
import type { FetchResult, PriceRecord } from "./domain.ts";

export class StorageError extends Data.TaggedError("StorageError")<{
  readonly message: string;
}> {}

export class PriceStore extends Context.Tag("PriceStore")<
  PriceStore,
  {
    /** Write the whole batch in one transaction. `true` on commit; `false`
     *  (after rollback) on any storage failure or an empty batch. */
    readonly store: (batch: FetchResult) => Effect.Effect<boolean>;
  }
>() {}

const PRICE_COLUMNS = [
  "open_price",
  "high_price",
  "low_price",
  "close_price",
  "volume",
  "updated_at",
] as const;

export function toRow(record: PriceRecord, updatedAt: string) {
  return {
    symbol: record.symbol,
    date: record.date,
    open_price: record.open,
    high_price: record.high,
    low_price: record.low,
    close_price: record.close,
    volume: record.volume,
    updated_at: updatedAt,
  };
}

export const KnexPriceStoreLive = Layer.effect(
  PriceStore,
  Effect.gen(function* () {
    const db = yield* Database;

    const upsert = (batch: FetchResult, updatedAt: string) =>
      Effect.tryPromise({
        try: async () => {
          await ensureSchema(db);
          return db.transaction(async (trx) => {
            let total = 0;
            for (const records of batch.values()) {
              if (records.length === 0) continue;
              await trx(STOCK_DATA_TABLE)
                .insert(records.map((r) => toRow(r, updatedAt)))
                .onConflict(["symbol", "date"])
                .merge([...PRICE_COLUMNS]);
              total += records.length;
            }
            return total;
          });
        },
        catch: (e) =>
          new StorageError({ message: e instanceof Error ? e.message : String(e) }),
      });

    return PriceStore.of({
      store: (batch) =>
        Effect.gen(function* () {
          if (batch.size === 0) {
            yield* Effect.logWarning("No data to store");
            return false;
          }
          const now = yield* Clock.currentTimeMillis;
          const total = yield* upsert(batch, new Date(now).toISOString());
          yield* Effect.logInfo(`Successfully stored ${total} records`);
          return true;
        }).pipe(
          Effect.catchTag("StorageError", (e) =>
            Effect.logError(`Database error: ${e.message}`).pipe(Effect.as(false)),
          ),
        ),
    });
  }),
);
