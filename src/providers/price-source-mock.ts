// In-memory price sources and settings for tests.

import { Duration, Effect, Option } from "effect";
import type { PipelineSettings } from "../config.ts";
import type { PriceRecord, ProviderId } from "../domain.ts";
import type { PriceSource, PriceSourceError } from "../price-source.ts";

// --- Sample data ---

export function sampleRecord(
  symbol: string,
  date: string,
  overrides: Partial<PriceRecord> = {},
): PriceRecord {
  return {
    symbol,
    date,
    open: 100.0,
    high: 101.0,
    low: 99.0,
    close: 100.5,
    volume: 1_000_000,
    ...overrides,
  };
}

export const testSettings = (
  overrides: Partial<PipelineSettings> = {},
): PipelineSettings => ({
  primarySource: "yf",
  fallbackSource: Option.none(),
  symbols: ["GOOGL"],
  requestTimeout: Duration.seconds(30),
  alphaVantage: {
    apiKey: Option.none(),
    baseUrl: "https://alpha.test/query",
  },
  database: {
    host: "localhost",
    port: 5432,
    database: "stocks",
    user: "postgres",
    password: Option.none(),
  },
  ...overrides,
});

// --- Fake sources ---

export interface FakeSource extends PriceSource {
  /** Symbols requested so far, in call order. */
  readonly calls: ReadonlyArray<string>;
}

/** Answers from a fixed table; symbols missing from it get no records. */
export function fakeSource(
  id: ProviderId,
  answers: Readonly<Record<string, ReadonlyArray<PriceRecord>>>,
): FakeSource {
  const calls: string[] = [];
  return {
    id,
    calls,
    fetchDaily: (symbol) =>
      Effect.sync(() => {
        calls.push(symbol);
        return answers[symbol] ?? [];
      }),
  };
}

/** Fails every request with `error`. */
export function failingSource(id: ProviderId, error: PriceSourceError): FakeSource {
  const calls: string[] = [];
  return {
    id,
    calls,
    fetchDaily: (symbol) =>
      Effect.suspend(() => {
        calls.push(symbol);
        return Effect.fail(error);
      }),
  };
}

/** Dies on every request, as a provider bug would. */
export function crashingSource(id: ProviderId, defect: unknown): FakeSource {
  const calls: string[] = [];
  return {
    id,
    calls,
    fetchDaily: (symbol) =>
      Effect.suspend(() => {
        calls.push(symbol);
        return Effect.die(defect);
      }),
  };
}
