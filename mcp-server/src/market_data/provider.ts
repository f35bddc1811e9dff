/**
 * Provider boundary for MarketDataClient.
 *
 * The client only sees this interface; YahooFinanceProvider implements it on
 * top of yahoo-finance2 and tests substitute an in-memory fake.
 */

/** One OHLCV observation as returned upstream. Any field may be null. */
export interface OhlcvBar {
  date: Date;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number | null;
}

export interface PriceSeries {
  /** IANA zone of the exchange, used to render calendar dates */
  timeZone?: string;
  /** Chronological order */
  bars: OhlcvBar[];
}

export type TrailingPeriod = "5d" | "1y";

export type HistoryRequest =
  | { kind: "period"; period: TrailingPeriod; interval?: string }
  | { kind: "range"; start?: string; end?: string; interval?: string };

export interface MarketDataProvider {
  history(symbol: string, request: HistoryRequest): Promise<PriceSeries>;
  /** Flat key/value fundamentals (trailingPE, sector, ...). Shape is not guaranteed. */
  info(symbol: string): Promise<unknown>;
  /** Raw quote matches, at most `maxResults` */
  search(query: string, maxResults: number): Promise<unknown[]>;
}

export type ProviderFaultKind = "transport" | "decode" | "rejected" | "unknown";

export class ProviderError extends Error {
  readonly kind: ProviderFaultKind;

  constructor(kind: ProviderFaultKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProviderError";
    this.kind = kind;
  }
}

const TRANSPORT_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EPIPE",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const DECODE_NAMES = new Set(["FailedYahooValidationError", "SyntaxError"]);
const REJECTED_NAMES = new Set(["InvalidOptionsError", "BadRequestError"]);
const TRANSPORT_NAMES = new Set(["HTTPError", "TimeoutError", "AbortError", "FetchError"]);

function errorCode(err: Error): string | undefined {
  const code: unknown = Reflect.get(err, "code");
  if (typeof code === "string") return code;
  const cause: unknown = err.cause;
  return cause instanceof Error ? errorCode(cause) : undefined;
}

/**
 * Map anything thrown at the provider boundary to a fault kind for logging.
 * Every kind leads to the same outcome (no result); the kind only tells the
 * operator where the fault came from.
 */
export function classifyProviderError(err: unknown): ProviderFaultKind {
  if (err instanceof ProviderError) return err.kind;
  if (!(err instanceof Error)) return "unknown";

  const code = errorCode(err);
  if (code && TRANSPORT_CODES.has(code)) return "transport";
  if (TRANSPORT_NAMES.has(err.name)) return "transport";
  // undici reports network failures as TypeError("fetch failed")
  if (err.name === "TypeError" && err.message === "fetch failed") return "transport";
  if (DECODE_NAMES.has(err.name)) return "decode";
  if (REJECTED_NAMES.has(err.name)) return "rejected";
  return "unknown";
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
