// Pure formatting functions — no I/O.

import type { FetchResult } from "./domain.ts";
import type { HttpError, PriceSourceError } from "./price-source.ts";

// --- ANSI escape codes ---

const GREEN = "\x1b[32m";
const RED = "\x1b[31m";
const BOLD = "\x1b[1m";
const DIM = "\x1b[2m";
const RESET = "\x1b[0m";

// --- Run summary ---

export function formatSummary(
  symbols: ReadonlyArray<string>,
  result: FetchResult,
): string {
  const lines = symbols.map((symbol) => {
    const records = result.get(symbol) ?? [];
    if (records.length === 0) {
      return `  ${RED}✗${RESET} ${BOLD}${symbol}${RESET}  ${DIM}no data${RESET}`;
    }
    const dates = records.map((r) => r.date).sort();
    const span = `${dates[0]} → ${dates[dates.length - 1]}`;
    const noun = records.length === 1 ? "record" : "records";
    return `  ${GREEN}✓${RESET} ${BOLD}${symbol}${RESET}  ${records.length} ${noun}  ${DIM}${span}${RESET}`;
  });

  return ["", ...lines, ""].join("\n");
}

// --- Error formatting ---

/** One-line description of a provider failure, for log output. */
export function describeError(error: PriceSourceError): string {
  const friendly = classifyError(error);
  return `${friendly.title}: ${friendly.hint}`;
}

interface ClassifiedError {
  readonly title: string;
  readonly hint: string;
}

function classifyError(error: PriceSourceError): ClassifiedError {
  switch (error._tag) {
    case "NetworkError":
      return {
        title: "Network error",
        hint: error.message,
      };
    case "HttpError":
      return classifyHttpError(error);
    case "SymbolNotFound":
      return {
        title: "No time series",
        hint: `The provider has no daily data for ${error.symbol}`,
      };
    case "ServiceError":
      return {
        title: "Provider error",
        hint: error.message,
      };
    case "RateLimited":
      return {
        title: "Rate limited",
        hint: error.message,
      };
    case "ParseError":
      return {
        title: "Unexpected response",
        hint: error.message,
      };
  }
}

function classifyHttpError(error: HttpError): ClassifiedError {
  if (error.status === 429) {
    return {
      title: "Rate limited",
      hint: "HTTP 429",
    };
  }
  if (error.status >= 500 && error.status < 600) {
    return {
      title: "Server error",
      hint: `HTTP ${error.status}`,
    };
  }
  return {
    title: "HTTP error",
    hint: `HTTP ${error.status}`,
  };
}
