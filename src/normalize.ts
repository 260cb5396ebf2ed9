// Record normalization — provider rows into canonical PriceRecords.
//
// Each row is converted on its own; a row that fails is logged and skipped
// so the rest of the batch still comes through.

import { Effect, Either, Schema } from "effect";
import { PriceRecord } from "./domain.ts";

// --- Provider row schemas ---

const Field = Schema.optional(Schema.NullOr(Schema.Union(Schema.String, Schema.Number)));

/** One day of an Alpha Vantage TIME_SERIES_DAILY series. Values are
 *  numeric strings. */
const AlphaVantageDay = Schema.Struct({
  "1. open": Field,
  "2. high": Field,
  "3. low": Field,
  "4. close": Field,
  "5. volume": Field,
});

/** One row of a Yahoo Finance chart. Yahoo reports gaps as nulls. */
const YahooQuoteRow = Schema.Struct({
  date: Schema.ValidDateFromSelf,
  open: Schema.optional(Schema.NullOr(Schema.Number)),
  high: Schema.optional(Schema.NullOr(Schema.Number)),
  low: Schema.optional(Schema.NullOr(Schema.Number)),
  close: Schema.optional(Schema.NullOr(Schema.Number)),
  volume: Schema.optional(Schema.NullOr(Schema.Number)),
});

// --- Conversion ---

interface Rejected {
  readonly at: string;
  readonly reason: string;
}

type Converted = Either.Either<PriceRecord, Rejected>;

function toNumber(
  value: string | number | null | undefined,
  name: string,
): Either.Either<number, string> {
  if (value === undefined || value === null) {
    return Either.left(`missing "${name}"`);
  }
  if (typeof value === "number") return Either.right(value);
  const trimmed = value.trim();
  const parsed = trimmed === "" ? Number.NaN : Number(trimmed);
  return Number.isNaN(parsed)
    ? Either.left(`non-numeric "${name}": "${value}"`)
    : Either.right(parsed);
}

function validate(candidate: {
  readonly symbol: string;
  readonly date: string;
  readonly open: number;
  readonly high: number;
  readonly low: number;
  readonly close: number;
  readonly volume: number;
}): Either.Either<PriceRecord, string> {
  return Schema.decodeUnknownEither(PriceRecord)({
    ...candidate,
    // Some feeds send volume as "123.0".
    volume: Math.trunc(candidate.volume),
  }).pipe(Either.mapLeft((e) => e.message));
}

function alphaVantageDayToRecord(
  date: string,
  day: unknown,
  symbol: string,
): Converted {
  return Schema.decodeUnknownEither(AlphaVantageDay)(day).pipe(
    Either.mapLeft((e) => e.message),
    Either.flatMap((d) =>
      Either.all({
        open: toNumber(d["1. open"], "1. open"),
        high: toNumber(d["2. high"], "2. high"),
        low: toNumber(d["3. low"], "3. low"),
        close: toNumber(d["4. close"], "4. close"),
        volume: toNumber(d["5. volume"], "5. volume"),
      }),
    ),
    Either.flatMap((values) => validate({ symbol, date, ...values })),
    Either.mapLeft((reason) => ({ at: date, reason })),
  );
}

/** Calendar date of `instant` on the exchange's wall clock. */
function exchangeDate(instant: Date, gmtOffsetSeconds: number): string {
  return new Date(instant.getTime() + gmtOffsetSeconds * 1000).toISOString().slice(0, 10);
}

function yahooRowToRecord(
  row: unknown,
  index: number,
  symbol: string,
  gmtOffsetSeconds: number,
): Converted {
  return Schema.decodeUnknownEither(YahooQuoteRow)(row).pipe(
    Either.mapLeft((e) => ({ at: `row ${index}`, reason: e.message })),
    Either.flatMap((r) => {
      const date = exchangeDate(r.date, gmtOffsetSeconds);
      return Either.all({
        open: toNumber(r.open, "open"),
        high: toNumber(r.high, "high"),
        low: toNumber(r.low, "low"),
        close: toNumber(r.close, "close"),
        volume: toNumber(r.volume, "volume"),
      }).pipe(
        Either.flatMap((values) => validate({ symbol, date, ...values })),
        Either.mapLeft((reason) => ({ at: date, reason })),
      );
    }),
  );
}

function collect(
  symbol: string,
  converted: Iterable<Converted>,
): Effect.Effect<ReadonlyArray<PriceRecord>> {
  return Effect.gen(function* () {
    // Keyed by date: a repeated date keeps its first position, later values.
    const byDate = new Map<string, PriceRecord>();
    for (const result of converted) {
      if (Either.isLeft(result)) {
        yield* Effect.logWarning(
          `Skipping invalid record for ${symbol} on ${result.left.at}: ${result.left.reason}`,
        );
        continue;
      }
      const record = result.right;
      if (byDate.has(record.date)) {
        yield* Effect.logDebug(`Duplicate ${record.date} for ${symbol}, keeping the later row`);
      }
      byDate.set(record.date, record);
    }
    return Array.from(byDate.values());
  });
}

// --- Normalizers ---

/** Alpha Vantage series (date string → day) into records, in series order. */
export function normalizeAlphaVantageSeries(
  series: { readonly [date: string]: unknown },
  symbol: string,
): Effect.Effect<ReadonlyArray<PriceRecord>> {
  const converted = Object.entries(series).map(([date, day]) =>
    alphaVantageDayToRecord(date, day, symbol),
  );
  return collect(symbol, converted).pipe(
    Effect.tap((records) =>
      Effect.logInfo(`Parsed ${records.length} records for ${symbol}`),
    ),
  );
}

/** Yahoo chart rows into records, in row order. Row timestamps are UTC
 *  instants; `gmtOffsetSeconds` is the exchange's offset from UTC, so each
 *  bar lands on the exchange's trading day. */
export function normalizeYahooQuotes(
  rows: ReadonlyArray<unknown>,
  symbol: string,
  gmtOffsetSeconds = 0,
): Effect.Effect<ReadonlyArray<PriceRecord>> {
  return collect(
    symbol,
    rows.map((row, index) => yahooRowToRecord(row, index, symbol, gmtOffsetSeconds)),
  );
}
