#!/usr/bin/env -S npx tsx
import { Command, Options } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import {
  Config,
  Console,
  Cron,
  Data,
  Effect,
  Either,
  Layer,
  Logger,
  LogLevel,
  Schedule,
} from "effect";
import { PipelineConfig, PipelineConfigLive } from "./src/config.ts";
import { DatabaseLive } from "./src/database.ts";
import { PacingPolicyLive } from "./src/fetch-coordinator.ts";
import { formatSummary } from "./src/format.ts";
import { runPipelineReport } from "./src/pipeline.ts";
import { KnexPriceStoreLive } from "./src/price-store.ts";
import { YahooChartLive } from "./src/providers/yahoo-finance.ts";
import { PriceSourcesLive } from "./src/providers/registry.ts";

class InvalidCron extends Data.TaggedError("InvalidCron")<{
  readonly message: string;
}> {}

// --- Pipeline run with summary ---

const runOnce = Effect.gen(function* () {
  const { symbols } = yield* PipelineConfig;
  const report = yield* runPipelineReport;
  yield* Console.log(formatSummary(symbols, report.prices));
  return report.success;
});

// --- CLI ---

const run = Command.make("run", {}, () =>
  Effect.gen(function* () {
    const success = yield* runOnce;
    if (!success) {
      yield* Effect.sync(() => {
        process.exitCode = 1;
      });
    }
  }),
).pipe(Command.withDescription("Fetch the configured symbols once and store them"));

const cron = Options.text("cron").pipe(
  Options.withDescription("Cron expression for the daily run"),
  Options.withDefault("50 12 * * *"),
);

const timezone = Options.text("timezone").pipe(
  Options.withDescription("IANA time zone the cron expression is read in"),
  Options.withDefault("Asia/Kolkata"),
);

const schedule = Command.make("schedule", { cron, timezone }, ({ cron, timezone }) =>
  Effect.gen(function* () {
    const parsed = Cron.parse(cron, timezone);
    if (Either.isLeft(parsed)) {
      return yield* Effect.fail(
        new InvalidCron({ message: `Invalid cron expression "${cron}": ${parsed.left.message}` }),
      );
    }
    yield* Effect.logInfo(`Scheduled pipeline: "${cron}" (${timezone})`);
    yield* runOnce.pipe(Effect.schedule(Schedule.cron(parsed.right)));
  }),
).pipe(Command.withDescription("Run the pipeline on a cron schedule until stopped"));

const command = Command.make("stock-pipeline").pipe(
  Command.withSubcommands([run, schedule]),
);

// --- Layers ---

const LoggerLive = Layer.unwrapEffect(
  Config.logLevel("LOG_LEVEL").pipe(
    Config.withDefault(LogLevel.Info),
    Effect.map(Logger.minimumLogLevel),
  ),
);

const PipelineLive = Layer.mergeAll(
  PriceSourcesLive,
  PacingPolicyLive,
  KnexPriceStoreLive.pipe(Layer.provide(DatabaseLive)),
).pipe(
  Layer.provide(YahooChartLive),
  Layer.provide(FetchHttpClient.layer),
  Layer.provideMerge(PipelineConfigLive),
);

// --- Run ---

const cli = Command.run(command, {
  name: "stock-pipeline",
  version: "0.1.0",
});

cli(process.argv).pipe(
  Effect.catchTag("InvalidCron", (e) =>
    Console.error(e.message).pipe(
      Effect.zipRight(Effect.sync(() => {
        process.exitCode = 1;
      })),
    ),
  ),
  Effect.provide(PipelineLive),
  Effect.provide(LoggerLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
