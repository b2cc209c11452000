export type VendorMatchErrorCode =
  | "QUOTA_EXHAUSTED"
  | "MALFORMED_UPSTREAM_RESPONSE"
  | "TRANSIENT_PROVIDER_ERROR"
  | "LOCATION_UNRESOLVABLE"
  | "PLANNER_NO_CATEGORIES"
  | "QUERY_EMBEDDING_FAILED";

export type VendorMatchStage = "key_pool" | "planner" | "collector" | "embeddings";

export type VendorMatchFailure = {
  code: VendorMatchErrorCode;
  stage: VendorMatchStage;
  reason: string;
  retryable: boolean;
  next_action: string;
};

export class VendorMatchError extends Error {
  readonly code: VendorMatchErrorCode;
  readonly stage: VendorMatchStage;
  readonly retryable: boolean;
  readonly next_action: string;

  constructor(params: {
    code: VendorMatchErrorCode;
    stage: VendorMatchStage;
    reason: string;
    retryable?: boolean;
    next_action?: string;
  }) {
    super(params.reason);
    this.name = "VendorMatchError";
    this.code = params.code;
    this.stage = params.stage;
    this.retryable = params.retryable ?? false;
    this.next_action = params.next_action ?? "Inspect the stage logs and rerun the request.";
  }

  toFailure(): VendorMatchFailure {
    return {
      code: this.code,
      stage: this.stage,
      reason: this.message,
      retryable: this.retryable,
      next_action: this.next_action,
    };
  }
}

export class QuotaExhaustedError extends VendorMatchError {
  constructor(reason = "Every credential in the key pool is exhausted for the current window.") {
    super({
      code: "QUOTA_EXHAUSTED",
      stage: "key_pool",
      reason,
      retryable: true,
      next_action: "Wait for the rate-limit window to pass or supply additional API keys.",
    });
    this.name = "QuotaExhaustedError";
  }
}

export class MalformedUpstreamResponseError extends VendorMatchError {
  readonly excerpt: string;

  constructor(stage: VendorMatchStage, reason: string, raw = "") {
    super({
      code: "MALFORMED_UPSTREAM_RESPONSE",
      stage,
      reason,
      next_action: "Inspect the provider response and tighten the prompt or parser.",
    });
    this.name = "MalformedUpstreamResponseError";
    this.excerpt = raw.slice(0, 200);
  }
}

export class TransientProviderError extends VendorMatchError {
  readonly status: number | null;

  constructor(stage: VendorMatchStage, reason: string, status: number | null = null) {
    super({
      code: "TRANSIENT_PROVIDER_ERROR",
      stage,
      reason,
      retryable: true,
      next_action: "Retry the request; the provider reported a temporary failure.",
    });
    this.name = "TransientProviderError";
    this.status = status;
  }
}

export class LocationUnresolvableError extends VendorMatchError {
  constructor(location: string) {
    super({
      code: "LOCATION_UNRESOLVABLE",
      stage: "collector",
      reason: `Could not resolve location "${location}" to a bounding box.`,
      next_action: "Provide a more specific city or region name.",
    });
    this.name = "LocationUnresolvableError";
  }
}

/**
 * HTTP failure raised by the fetch-based adapters. Carries the status and the
 * response body so `classifyProviderError` can inspect them.
 */
export class ProviderHttpError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(provider: string, status: number, body: string) {
    super(`${provider} request failed: ${status} ${body.slice(0, 200)}`);
    this.name = "ProviderHttpError";
    this.status = status;
    this.body = body;
  }
}

export type ProviderErrorKind = "quota_exhausted" | "transient" | "malformed" | "fatal";

const QUOTA_PATTERN = /(rate[\s_-]?limit|quota|resource[\s_-]?exhausted|too many requests)/i;
const TRANSIENT_CODES = new Set(["ECONNRESET", "ECONNREFUSED", "ETIMEDOUT", "EAI_AGAIN", "ENOTFOUND", "UND_ERR_SOCKET"]);

function readStatus(error: object): number | null {
  if ("status" in error && typeof error.status === "number") return error.status;
  return null;
}

function readCode(error: object): string | null {
  if ("code" in error && typeof error.code === "string") return error.code;
  return null;
}

/**
 * Single place where provider failures are classified. Status codes win over
 * message text; the text heuristic only applies when no status is present or
 * the status is ambiguous (400/403 carrying a quota message).
 */
export function classifyProviderError(error: unknown): ProviderErrorKind {
  if (error instanceof QuotaExhaustedError) return "quota_exhausted";
  if (error instanceof MalformedUpstreamResponseError) return "malformed";
  if (error instanceof TransientProviderError) return "transient";
  if (error instanceof SyntaxError) return "malformed";
  if (typeof error !== "object" || error === null) {
    return typeof error === "string" && QUOTA_PATTERN.test(error) ? "quota_exhausted" : "fatal";
  }

  const status = readStatus(error);
  const message = error instanceof Error ? error.message : "";
  const body = "body" in error && typeof error.body === "string" ? error.body : "";

  if (status === 429) return "quota_exhausted";
  if ((status === 400 || status === 403) && QUOTA_PATTERN.test(`${message} ${body}`)) return "quota_exhausted";
  if (status !== null && (status >= 500 || status === 408)) return "transient";
  if (status === null && QUOTA_PATTERN.test(message)) return "quota_exhausted";

  const code = readCode(error);
  if (code && TRANSIENT_CODES.has(code)) return "transient";
  if (error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError")) return "transient";
  if (error instanceof Error && error.name === "APIConnectionError") return "transient";

  return "fatal";
}
