// Yahoo Finance — vendor-library implementation of PriceSource.

import { Clock, Context, Duration, Effect, Layer, Schema } from "effect";
import yahooFinance from "yahoo-finance2";
import { PipelineConfig } from "../config.ts";
import { normalizeYahooQuotes } from "../normalize.ts";
import {
  NetworkError,
  ParseError,
  type PriceSource,
  SymbolNotFound,
} from "../price-source.ts";

/** Trailing window requested on every run. */
export const HISTORY_WINDOW = Duration.days(5);

// --- Library boundary ---

export class YahooChart extends Context.Tag("YahooChart")<
  YahooChart,
  {
    /** Daily chart for `symbol` from `since` until now, as returned by the
     *  library. */
    readonly daily: (
      symbol: string,
      since: Date,
    ) => Effect.Effect<unknown, NetworkError>;
  }
>() {}

export const YahooChartLive = Layer.succeed(
  YahooChart,
  YahooChart.of({
    daily: (symbol, since) =>
      Effect.tryPromise({
        try: () => yahooFinance.chart(symbol, { period1: since, interval: "1d" }),
        catch: (e) =>
          new NetworkError({ message: e instanceof Error ? e.message : String(e) }),
      }),
  }),
);

// --- Yahoo chart schema ---

const YahooChartResult = Schema.Struct({
  meta: Schema.optional(
    Schema.Struct({
      gmtoffset: Schema.optional(Schema.Number),
    }),
  ),
  quotes: Schema.Array(Schema.Unknown),
});

export interface YahooChartRows {
  readonly rows: ReadonlyArray<unknown>;
  /** Exchange offset from UTC, in seconds. */
  readonly gmtOffset: number;
}

// --- Decode Yahoo chart into its rows ---

export function decodeYahooChart(
  result: unknown,
  symbol: string,
): Effect.Effect<YahooChartRows, ParseError | SymbolNotFound> {
  return Schema.decodeUnknown(YahooChartResult)(result).pipe(
    Effect.mapError(
      (schemaError) =>
        new ParseError({
          message: `Invalid response: ${schemaError.message}`,
        }),
    ),
    Effect.flatMap(({ meta, quotes }) =>
      quotes.length === 0
        ? Effect.fail(new SymbolNotFound({ symbol }))
        : Effect.succeed({ rows: quotes, gmtOffset: meta?.gmtoffset ?? 0 }),
    ),
  );
}

// --- Yahoo Finance source ---

export const makeYahooFinanceSource = Effect.gen(function* () {
  const config = yield* PipelineConfig;
  const chart = yield* YahooChart;

  const source: PriceSource = {
    id: "yf",
    fetchDaily: (symbol: string) =>
      Effect.gen(function* () {
        yield* Effect.logInfo(`[Yahoo Finance] Fetching data for ${symbol}`);
        const now = yield* Clock.currentTimeMillis;
        const since = new Date(now - Duration.toMillis(HISTORY_WINDOW));
        const result = yield* chart.daily(symbol, since);
        const { rows, gmtOffset } = yield* decodeYahooChart(result, symbol);
        return yield* normalizeYahooQuotes(rows, symbol, gmtOffset);
      }).pipe(
        Effect.timeoutFail({
          duration: config.requestTimeout,
          onTimeout: () =>
            new NetworkError({ message: `Timeout fetching data for ${symbol}` }),
        }),
      ),
  };
  return source;
});
