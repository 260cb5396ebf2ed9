// Price sources — service definition and provider errors.

import { Cause, Context, Data, Effect, Option } from "effect";
import type { PriceRecord, ProviderId } from "./domain.ts";
import { describeError } from "./format.ts";

// --- Errors ---

export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly message: string;
}> {}

export class HttpError extends Data.TaggedError("HttpError")<{
  readonly status: number;
}> {}

export class ParseError extends Data.TaggedError("ParseError")<{
  readonly message: string;
}> {}

export class SymbolNotFound extends Data.TaggedError("SymbolNotFound")<{
  readonly symbol: string;
}> {}

export class ServiceError extends Data.TaggedError("ServiceError")<{
  readonly message: string;
}> {}

export class RateLimited extends Data.TaggedError("RateLimited")<{
  readonly message: string;
}> {}

export type PriceSourceError =
  | NetworkError
  | HttpError
  | ParseError
  | SymbolNotFound
  | ServiceError
  | RateLimited;

// --- Service ---

export interface PriceSource {
  readonly id: ProviderId;
  /** Recent daily records for `symbol`, already normalized. An empty array
   *  means the provider answered but had nothing usable. */
  readonly fetchDaily: (
    symbol: string,
  ) => Effect.Effect<ReadonlyArray<PriceRecord>, PriceSourceError>;
}

/** The providers available in this process, keyed by identifier. A provider
 *  that could not be set up (e.g. missing credentials) is simply absent. */
export class PriceSources extends Context.Tag("PriceSources")<
  PriceSources,
  {
    readonly get: (id: ProviderId) => Option.Option<PriceSource>;
  }
>() {}

export function priceSourcesFrom(
  sources: ReadonlyArray<PriceSource>,
): Context.Tag.Service<PriceSources> {
  const byId = new Map(sources.map((source) => [source.id, source] as const));
  return PriceSources.of({
    get: (id) => Option.fromNullable(byId.get(id)),
  });
}

// --- Adapter boundary ---

/** Run one provider attempt. Provider failures, defects included, are
 *  logged and become an empty result; they never reach the caller.
 *  Interruption still propagates. */
export function fetchOrNoData(
  source: PriceSource,
  symbol: string,
): Effect.Effect<ReadonlyArray<PriceRecord>> {
  return source.fetchDaily(symbol).pipe(
    Effect.tap((records) =>
      records.length === 0
        ? Effect.logWarning("Provider returned no usable records")
        : Effect.logDebug(`Provider returned ${records.length} records`),
    ),
    Effect.catchAll((e) =>
      Effect.logWarning(describeError(e)).pipe(Effect.as([])),
    ),
    Effect.catchAllDefect((defect) =>
      Effect.logError(`Provider crashed: ${Cause.pretty(Cause.die(defect))}`).pipe(
        Effect.as([]),
      ),
    ),
    Effect.annotateLogs({ provider: source.id, symbol }),
  );
}
