// Pipeline configuration — read once from the environment at startup.

import {
  Config,
  type ConfigError,
  Context,
  Duration,
  type Effect,
  Layer,
  Option,
  type Redacted,
} from "effect";

export interface DatabaseSettings {
  readonly host: string;
  readonly port: number;
  readonly database: string;
  readonly user: string;
  readonly password: Option.Option<Redacted.Redacted>;
}

export interface PipelineSettings {
  /** Provider tokens are kept as given (lowercased); unknown tokens are
   *  dealt with when a fetch is attempted, not here. */
  readonly primarySource: string;
  readonly fallbackSource: Option.Option<string>;
  readonly symbols: ReadonlyArray<string>;
  readonly requestTimeout: Duration.Duration;
  readonly alphaVantage: {
    readonly apiKey: Option.Option<Redacted.Redacted>;
    readonly baseUrl: string;
  };
  readonly database: DatabaseSettings;
}

export class PipelineConfig extends Context.Tag("PipelineConfig")<
  PipelineConfig,
  PipelineSettings
>() {}

export const DEFAULT_SYMBOLS = ["GOOGL", "NVDA", "MSFT"] as const;

const sourceToken = (name: string) =>
  Config.string(name).pipe(
    Config.withDefault("yf"),
    Config.map((token) => token.trim().toLowerCase()),
  );

export function normalizeSymbols(raw: ReadonlyArray<string>): ReadonlyArray<string> {
  const symbols = raw.map((s) => s.trim().toUpperCase()).filter((s) => s.length > 0);
  return Array.from(new Set(symbols));
}

const settings = Config.all({
  primarySource: sourceToken("DATA_SOURCE"),
  fallbackSource: sourceToken("FALLBACK_SOURCE").pipe(
    Config.map((token) => (token === "" ? Option.none() : Option.some(token))),
  ),
  symbols: Config.array(Config.string(), "SYMBOLS").pipe(
    Config.withDefault(DEFAULT_SYMBOLS),
    Config.map(normalizeSymbols),
  ),
  requestTimeout: Config.integer("API_TIMEOUT").pipe(
    Config.withDefault(30),
    Config.validate({
      message: "API_TIMEOUT must be a positive number of seconds",
      validation: (seconds) => seconds > 0,
    }),
    Config.map(Duration.seconds),
  ),
  alphaVantage: Config.all({
    apiKey: Config.option(Config.redacted("ALPHA_API_KEY")),
    baseUrl: Config.string("ALPHA_VANTAGE_BASE_URL").pipe(
      Config.withDefault("https://www.alphavantage.co/query"),
    ),
  }),
  database: Config.all({
    host: Config.string("DB_HOST").pipe(Config.withDefault("localhost")),
    port: Config.integer("DB_PORT").pipe(Config.withDefault(5432)),
    database: Config.string("DB_NAME").pipe(Config.withDefault("stocks")),
    user: Config.string("DB_USER").pipe(Config.withDefault("postgres")),
    password: Config.option(Config.redacted("DB_PASS")),
  }),
});

export const loadSettings: Effect.Effect<PipelineSettings, ConfigError.ConfigError> =
  settings;

export const PipelineConfigLive = Layer.effect(PipelineConfig, loadSettings);
