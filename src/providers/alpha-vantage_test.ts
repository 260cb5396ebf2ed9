import { HttpClient, HttpClientError, HttpClientResponse } from "@effect/platform";
import { Effect, Either, Fiber, Option, Redacted, TestClock, TestContext } from "effect";
import { describe, expect, it } from "vitest";
import { PipelineConfig } from "../config.ts";
import type { PriceRecord } from "../domain.ts";
import type { PriceSourceError } from "../price-source.ts";
import { decodeAlphaVantageResponse, makeAlphaVantageSource } from "./alpha-vantage.ts";
import { testSettings } from "./price-source-mock.ts";

// --- Test data ---

const validResponse = {
  "Meta Data": {
    "1. Information": "Daily Prices (open, high, low, close) and Volumes",
    "2. Symbol": "GOOGL",
  },
  "Time Series (Daily)": {
    "2024-01-03": {
      "1. open": "101.0000",
      "2. high": "102.0000",
      "3. low": "100.0000",
      "4. close": "101.5000",
      "5. volume": "2000000",
    },
    "2024-01-02": {
      "1. open": "100.0000",
      "2. high": "101.0000",
      "3. low": "99.0000",
      "4. close": "100.5000",
      "5. volume": "1000000",
    },
  },
};

// --- Helpers ---

function decodeFailure(json: unknown) {
  return Effect.runPromise(Effect.flip(decodeAlphaVantageResponse(json, "GOOGL")));
}

type Reply =
  | { readonly status: number; readonly body: string }
  | { readonly transportError: true }
  | { readonly hang: true };

function stubClient(reply: Reply) {
  const urls: string[] = [];
  const client = HttpClient.make((request, url) =>
    Effect.suspend(() => {
      urls.push(url.toString());
      if ("hang" in reply) return Effect.never;
      if ("transportError" in reply) {
        return Effect.fail(
          new HttpClientError.RequestError({
            request,
            reason: "Transport",
            cause: new Error("connection refused"),
          }),
        );
      }
      return Effect.succeed(
        HttpClientResponse.fromWeb(request, new Response(reply.body, { status: reply.status })),
      );
    }),
  );
  return { client, urls };
}

const json = (body: unknown, status = 200): Reply => ({ status, body: JSON.stringify(body) });

function fetchWith(
  reply: Reply,
  apiKey: Option.Option<string> = Option.some("test-key"),
) {
  const { client, urls } = stubClient(reply);
  const settings = testSettings({
    alphaVantage: {
      apiKey: Option.map(apiKey, (key) => Redacted.make(key)),
      baseUrl: "https://alpha.test/query",
    },
  });
  const result = makeAlphaVantageSource.pipe(
    Effect.flatMap((source) =>
      Option.match(source, {
        onNone: () => Effect.succeed(Option.none<Either.Either<ReadonlyArray<PriceRecord>, PriceSourceError>>()),
        onSome: (s) => Effect.map(Effect.either(s.fetchDaily("GOOGL")), Option.some),
      }),
    ),
    Effect.provideService(PipelineConfig, settings),
    Effect.provideService(HttpClient.HttpClient, client),
    Effect.runPromise,
  );
  return { result, urls };
}

// --- decodeAlphaVantageResponse ---

describe("decodeAlphaVantageResponse", () => {
  it("returns the daily series of a valid response", async () => {
    const series = await Effect.runPromise(decodeAlphaVantageResponse(validResponse, "GOOGL"));
    expect(Object.keys(series)).toEqual(["2024-01-03", "2024-01-02"]);
  });

  it("null input returns ParseError", async () => {
    const error = await decodeFailure(null);
    expect(error._tag).toBe("ParseError");
  });

  it("non-object input returns ParseError", async () => {
    const error = await decodeFailure("not an object");
    expect(error._tag).toBe("ParseError");
  });

  it("Error Message field returns ServiceError", async () => {
    const error = await decodeFailure({ "Error Message": "Invalid API call" });
    expect(error).toMatchObject({ _tag: "ServiceError", message: "Invalid API call" });
  });

  it("Note field returns RateLimited", async () => {
    const error = await decodeFailure({
      Note: "Thank you for using Alpha Vantage! Rate limit exceeded.",
    });
    expect(error._tag).toBe("RateLimited");
  });

  it("Information field returns RateLimited", async () => {
    const error = await decodeFailure({ Information: "Please slow down." });
    expect(error._tag).toBe("RateLimited");
  });

  it("missing time series returns SymbolNotFound", async () => {
    const error = await decodeFailure({ "Meta Data": {} });
    expect(error).toMatchObject({ _tag: "SymbolNotFound", symbol: "GOOGL" });
  });

  it("non-object time series returns ParseError", async () => {
    const error = await decodeFailure({ "Time Series (Daily)": "nothing" });
    expect(error._tag).toBe("ParseError");
  });
});

// --- makeAlphaVantageSource ---

describe("makeAlphaVantageSource", () => {
  it("requests TIME_SERIES_DAILY and normalizes the series", async () => {
    const { result, urls } = fetchWith(json(validResponse));
    const outcome = await result;

    expect(urls).toEqual([
      "https://alpha.test/query?function=TIME_SERIES_DAILY&symbol=GOOGL&apikey=test-key",
    ]);
    expect(outcome).toEqual(
      Option.some(
        Either.right([
          {
            symbol: "GOOGL",
            date: "2024-01-03",
            open: 101,
            high: 102,
            low: 100,
            close: 101.5,
            volume: 2000000,
          },
          {
            symbol: "GOOGL",
            date: "2024-01-02",
            open: 100,
            high: 101,
            low: 99,
            close: 100.5,
            volume: 1000000,
          },
        ]),
      ),
    );
  });

  it("is not offered without an API key", async () => {
    const { result, urls } = fetchWith(json(validResponse), Option.none());
    expect(await result).toEqual(Option.none());
    expect(urls).toEqual([]);
  });

  it("maps a non-2xx status to HttpError", async () => {
    const { result } = fetchWith(json({}, 503));
    const outcome = Option.getOrThrow(await result);
    expect(Either.isLeft(outcome) && outcome.left).toMatchObject({ _tag: "HttpError", status: 503 });
  });

  it("maps malformed JSON to ParseError", async () => {
    const { result } = fetchWith({ status: 200, body: "<html>oops</html>" });
    const outcome = Option.getOrThrow(await result);
    expect(Either.isLeft(outcome) && outcome.left._tag).toBe("ParseError");
  });

  it("maps a transport failure to NetworkError", async () => {
    const { result } = fetchWith({ transportError: true });
    const outcome = Option.getOrThrow(await result);
    expect(Either.isLeft(outcome) && outcome.left._tag).toBe("NetworkError");
  });

  it("maps a rate-limit notice to RateLimited", async () => {
    const { result } = fetchWith(json({ Note: "5 calls per minute" }));
    const outcome = Option.getOrThrow(await result);
    expect(Either.isLeft(outcome) && outcome.left._tag).toBe("RateLimited");
  });

  it("gives up with NetworkError once the request timeout passes", async () => {
    const { client } = stubClient({ hang: true });
    const settings = testSettings({
      alphaVantage: {
        apiKey: Option.some(Redacted.make("test-key")),
        baseUrl: "https://alpha.test/query",
      },
    });

    const outcome = await Effect.gen(function* () {
      const source = Option.getOrThrow(yield* makeAlphaVantageSource);
      const fiber = yield* Effect.fork(Effect.either(source.fetchDaily("GOOGL")));
      yield* TestClock.adjust("31 seconds");
      return yield* Fiber.join(fiber);
    }).pipe(
      Effect.provideService(PipelineConfig, settings),
      Effect.provideService(HttpClient.HttpClient, client),
      Effect.provide(TestContext.TestContext),
      Effect.runPromise,
    );

    expect(Either.isLeft(outcome) && outcome.left).toMatchObject({
      _tag: "NetworkError",
      message: "Timeout fetching data for GOOGL",
    });
  });
});
