// Pipeline — fetch every configured symbol, then store the batch once.

import { Cause, Effect, Option } from "effect";
import { PipelineConfig } from "./config.ts";
import type { FetchResult, PriceRecord } from "./domain.ts";
import { fetchSymbol, PacingPolicy } from "./fetch-coordinator.ts";
import type { PriceSources } from "./price-source.ts";
import { PriceStore } from "./price-store.ts";

type PipelineServices = PipelineConfig | PriceSources | PacingPolicy | PriceStore;

/** Fetch the configured symbols one after another, in order. Symbols that
 *  end up without data are left out of the result. */
export const collectPrices: Effect.Effect<
  FetchResult,
  never,
  PipelineConfig | PriceSources | PacingPolicy
> = Effect.gen(function* () {
  const { symbols } = yield* PipelineConfig;
  const pacing = yield* PacingPolicy;
  const result = new Map<string, ReadonlyArray<PriceRecord>>();

  yield* Effect.forEach(
    symbols,
    (symbol, index) =>
      Effect.gen(function* () {
        const records = yield* fetchSymbol(symbol);
        if (records.length > 0) result.set(symbol, records);
        if (index < symbols.length - 1) yield* pacing.betweenSymbols;
      }),
    { discard: true },
  );

  return result;
});

export interface RunReport {
  readonly success: boolean;
  readonly prices: FetchResult;
}

const emptyReport: RunReport = { success: false, prices: new Map() };

/** One full run, with what it collected. Never fails: anything unexpected
 *  is logged and reported as an unsuccessful run. */
export const runPipelineReport: Effect.Effect<RunReport, never, PipelineServices> =
  Effect.gen(function* () {
    const config = yield* PipelineConfig;
    const fallback = Option.getOrElse(config.fallbackSource, () => "none");
    yield* Effect.logInfo(
      `Starting stock data pipeline with source=${config.primarySource}, fallback=${fallback}`,
    );

    const prices = yield* collectPrices;
    if (prices.size === 0) {
      yield* Effect.logError("No data fetched, exiting");
      return emptyReport;
    }

    const store = yield* PriceStore;
    const success = yield* store.store(prices);
    if (success) {
      yield* Effect.logInfo("Pipeline completed successfully");
    } else {
      yield* Effect.logError("Pipeline failed");
    }
    return { success, prices };
  }).pipe(
    Effect.catchAllCause((cause) =>
      Effect.logError(`Pipeline failed: ${Cause.pretty(cause)}`).pipe(
        Effect.as(emptyReport),
      ),
    ),
  );

/** `true` iff at least one symbol produced data and the store committed. */
export const runPipeline: Effect.Effect<boolean, never, PipelineServices> =
  Effect.map(runPipelineReport, (report) => report.success);
