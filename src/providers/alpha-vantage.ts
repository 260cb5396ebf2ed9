// Alpha Vantage — REST JSON implementation of PriceSource.

import { HttpClient } from "@effect/platform";
import { Effect, Option, Redacted, Schema } from "effect";
import { PipelineConfig } from "../config.ts";
import { normalizeAlphaVantageSeries } from "../normalize.ts";
import {
  HttpError,
  NetworkError,
  ParseError,
  type PriceSource,
  RateLimited,
  ServiceError,
  SymbolNotFound,
} from "../price-source.ts";

// --- Alpha Vantage response schema ---

const SERIES_FIELD = "Time Series (Daily)";

const AlphaVantageDailyResponse = Schema.Struct({
  "Error Message": Schema.optional(Schema.String),
  Note: Schema.optional(Schema.String),
  Information: Schema.optional(Schema.String),
  [SERIES_FIELD]: Schema.optional(
    Schema.Record({ key: Schema.String, value: Schema.Unknown }),
  ),
});

export type AlphaVantageSeries = { readonly [date: string]: unknown };

// --- Decode Alpha Vantage response into its daily series ---

export function decodeAlphaVantageResponse(
  json: unknown,
  symbol: string,
): Effect.Effect<
  AlphaVantageSeries,
  ParseError | SymbolNotFound | ServiceError | RateLimited
> {
  if (typeof json !== "object" || json === null || Array.isArray(json)) {
    return Effect.fail(new ParseError({ message: "Response is not an object" }));
  }

  return Schema.decodeUnknown(AlphaVantageDailyResponse)(json).pipe(
    Effect.mapError(
      (e) => new ParseError({ message: `Invalid response: ${e.message}` }),
    ),
    Effect.flatMap((response): Effect.Effect<
      AlphaVantageSeries,
      SymbolNotFound | ServiceError | RateLimited
    > => {
      // Alpha Vantage signals service-level errors via top-level string fields.
      if (response["Error Message"] !== undefined) {
        return Effect.fail(new ServiceError({ message: response["Error Message"] }));
      }
      if (response.Note !== undefined) {
        return Effect.fail(new RateLimited({ message: response.Note }));
      }
      if (response.Information !== undefined) {
        return Effect.fail(new RateLimited({ message: response.Information }));
      }
      const series = response[SERIES_FIELD];
      return series === undefined
        ? Effect.fail(new SymbolNotFound({ symbol }))
        : Effect.succeed(series);
    }),
  );
}

// --- Alpha Vantage source ---

/** Build the Alpha Vantage source. Without an API key there is nothing to
 *  call, so the source is not offered at all. */
export const makeAlphaVantageSource = Effect.gen(function* () {
  const config = yield* PipelineConfig;
  const client = (yield* HttpClient.HttpClient).pipe(HttpClient.filterStatusOk);
  const { baseUrl } = config.alphaVantage;

  return Option.map(config.alphaVantage.apiKey, (apiKey): PriceSource => ({
    id: "alpha_vantage",
    fetchDaily: (symbol: string) =>
      Effect.gen(function* () {
        yield* Effect.logInfo(`[Alpha Vantage] Fetching data for ${symbol}`);
        const url =
          `${baseUrl}?function=TIME_SERIES_DAILY&symbol=${encodeURIComponent(symbol)}` +
          `&apikey=${encodeURIComponent(Redacted.value(apiKey))}`;
        const response = yield* client.get(url);
        const json = yield* response.json;
        const series = yield* decodeAlphaVantageResponse(json, symbol);
        return yield* normalizeAlphaVantageSeries(series, symbol);
      }).pipe(
        // The response body lives in the request's scope.
        Effect.scoped,
        Effect.timeoutFail({
          duration: config.requestTimeout,
          onTimeout: () =>
            new NetworkError({ message: `Timeout fetching data for ${symbol}` }),
        }),
        Effect.catchTags({
          RequestError: (e) =>
            Effect.fail(new NetworkError({ message: e.message })),
          ResponseError: (e) =>
            e.reason === "StatusCode"
              ? Effect.fail(new HttpError({ status: e.response.status }))
              : Effect.fail(
                  new ParseError({
                    message: `JSON parse failed: ${e.message}`,
                  }),
                ),
        }),
      ),
  }));
});
