// Provider registry — every source this process can reach.

import { Effect, Layer, Option } from "effect";
import { PriceSources, priceSourcesFrom } from "../price-source.ts";
import { makeAlphaVantageSource } from "./alpha-vantage.ts";
import { makeYahooFinanceSource } from "./yahoo-finance.ts";

export const PriceSourcesLive = Layer.effect(
  PriceSources,
  Effect.gen(function* () {
    const yahoo = yield* makeYahooFinanceSource;
    const alphavantage = yield* makeAlphaVantageSource;

    if (Option.isNone(alphavantage)) {
      yield* Effect.logDebug("ALPHA_API_KEY not set, Alpha Vantage unavailable");
    }

    const sources = [yahoo, ...Option.toArray(alphavantage)];
    yield* Effect.logDebug(
      `Initialized with providers: ${sources.map((s) => s.id).join(", ")}`,
    );
    return priceSourcesFrom(sources);
  }),
);
