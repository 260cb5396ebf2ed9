// Fetch coordinator — primary provider, then at most one fallback.

import { Context, Duration, Effect, Layer, Option } from "effect";
import { PipelineConfig, type PipelineSettings } from "./config.ts";
import { type PriceRecord, parseProviderId } from "./domain.ts";
import { fetchOrNoData, PriceSources } from "./price-source.ts";

// --- Provider dispatch ---

/** Fetch `symbol` from the provider named by `token`. Unknown or
 *  unavailable providers are logged and yield no data. */
export function fetchFrom(
  token: string,
  symbol: string,
): Effect.Effect<ReadonlyArray<PriceRecord>, never, PriceSources> {
  return Effect.gen(function* () {
    const sources = yield* PriceSources;
    const id = parseProviderId(token);
    if (Option.isNone(id)) {
      yield* Effect.logError(`Unknown data source: ${token}`);
      return [];
    }
    const source = sources.get(id.value);
    if (Option.isNone(source)) {
      yield* Effect.logError(`Data source ${token} is not configured`);
      return [];
    }
    return yield* fetchOrNoData(source.value, symbol);
  });
}

/** The fallback worth trying: set, and different from the primary. */
export function fallbackFor(settings: PipelineSettings): Option.Option<string> {
  return Option.filter(
    settings.fallbackSource,
    (fallback) => fallback !== settings.primarySource,
  );
}

// --- Per-symbol fetch ---

export function fetchSymbol(
  symbol: string,
): Effect.Effect<ReadonlyArray<PriceRecord>, never, PipelineConfig | PriceSources> {
  return Effect.gen(function* () {
    const config = yield* PipelineConfig;
    yield* Effect.logInfo(`Fetching ${symbol} using ${config.primarySource}`);

    const primary = yield* fetchFrom(config.primarySource, symbol);
    if (primary.length > 0) return primary;

    const fallback = fallbackFor(config);
    if (Option.isNone(fallback)) return primary;

    yield* Effect.logWarning(
      `Primary source '${config.primarySource}' failed for ${symbol}. ` +
        `Falling back to '${fallback.value}'`,
    );
    return yield* fetchFrom(fallback.value, symbol);
  });
}

// --- Pacing ---

/** What to do between two consecutive symbols of a run. */
export class PacingPolicy extends Context.Tag("PacingPolicy")<
  PacingPolicy,
  {
    readonly betweenSymbols: Effect.Effect<void>;
  }
>() {}

/** Alpha Vantage's free tier allows five calls a minute. */
export const RATE_LIMITED_DELAY = Duration.seconds(12);

export function interSymbolDelay(primarySource: string): Option.Option<Duration.Duration> {
  return primarySource === "alpha_vantage"
    ? Option.some(RATE_LIMITED_DELAY)
    : Option.none();
}

export const PacingPolicyLive = Layer.effect(
  PacingPolicy,
  Effect.map(PipelineConfig, (config) =>
    PacingPolicy.of({
      betweenSymbols: Option.match(interSymbolDelay(config.primarySource), {
        onNone: () => Effect.void,
        onSome: (delay) =>
          Effect.logInfo("Waiting to respect API rate limits...").pipe(
            Effect.zipRight(Effect.sleep(delay)),
          ),
      }),
    }),
  ),
);
