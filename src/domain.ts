// Domain types and schemas — no I/O.

import { Option, Schema } from "effect";

// --- Canonical price record ---

const Price = Schema.Number.pipe(Schema.finite(), Schema.nonNegative());

export const PriceRecord = Schema.Struct({
  symbol: Schema.NonEmptyString,
  date: Schema.String.pipe(Schema.pattern(/^\d{4}-\d{2}-\d{2}$/)), // ISO-8601 calendar date
  open: Price,
  high: Price,
  low: Price,
  close: Price,
  volume: Schema.Number.pipe(Schema.int(), Schema.nonNegative()),
});

export type PriceRecord = typeof PriceRecord.Type;

/** Records per symbol for one run, in configured symbol order. Symbols
 *  without data are absent. */
export type FetchResult = ReadonlyMap<string, ReadonlyArray<PriceRecord>>;

// --- Providers ---

export const ProviderIds = ["alpha_vantage", "yf"] as const;

export type ProviderId = (typeof ProviderIds)[number];

export function parseProviderId(token: string): Option.Option<ProviderId> {
  const id = ProviderIds.find((candidate) => candidate === token);
  return Option.fromNullable(id);
}
