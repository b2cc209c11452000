import { describe, it, expect } from "vitest";
import {
  LocationUnresolvableError,
  MalformedUpstreamResponseError,
  ProviderHttpError,
  QuotaExhaustedError,
  TransientProviderError,
  classifyProviderError,
} from "../errors";

function withStatus(message: string, status: number) {
  return Object.assign(new Error(message), { status });
}

describe("classifyProviderError", () => {
  it("treats 429 as quota exhaustion", () => {
    expect(classifyProviderError(withStatus("slow down", 429))).toBe("quota_exhausted");
  });

  it("uses the quota text only for ambiguous statuses", () => {
    expect(classifyProviderError(withStatus("You exceeded your current quota", 403))).toBe("quota_exhausted");
    expect(classifyProviderError(new ProviderHttpError("places", 400, '{"status":"RESOURCE_EXHAUSTED"}'))).toBe(
      "quota_exhausted"
    );
    expect(classifyProviderError(withStatus("Invalid request", 400))).toBe("fatal");
    expect(classifyProviderError(withStatus("quota service crashed", 500))).toBe("transient");
  });

  it("treats server errors and timeouts as transient", () => {
    expect(classifyProviderError(withStatus("bad gateway", 502))).toBe("transient");
    expect(classifyProviderError(withStatus("request timeout", 408))).toBe("transient");
    expect(classifyProviderError(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }))).toBe("transient");
    const abort = new Error("aborted");
    abort.name = "AbortError";
    expect(classifyProviderError(abort)).toBe("transient");
  });

  it("falls back to the message when no status is present", () => {
    expect(classifyProviderError(new Error("Rate limit reached"))).toBe("quota_exhausted");
    expect(classifyProviderError("too many requests")).toBe("quota_exhausted");
    expect(classifyProviderError(new Error("invalid api key"))).toBe("fatal");
  });

  it("recognises the pipeline's own errors", () => {
    expect(classifyProviderError(new QuotaExhaustedError())).toBe("quota_exhausted");
    expect(classifyProviderError(new TransientProviderError("collector", "upstream 503", 503))).toBe("transient");
    expect(classifyProviderError(new MalformedUpstreamResponseError("planner", "no json"))).toBe("malformed");
    expect(classifyProviderError(new SyntaxError("Unexpected token"))).toBe("malformed");
  });
});

describe("VendorMatchError.toFailure", () => {
  it("carries code, stage and next action", () => {
    expect(new LocationUnresolvableError("Atlantis").toFailure()).toEqual({
      code: "LOCATION_UNRESOLVABLE",
      stage: "collector",
      reason: 'Could not resolve location "Atlantis" to a bounding box.',
      retryable: false,
      next_action: "Provide a more specific city or region name.",
    });
    expect(new QuotaExhaustedError().toFailure().retryable).toBe(true);
  });

  it("keeps a bounded excerpt of malformed payloads", () => {
    const error = new MalformedUpstreamResponseError("planner", "no json", "x".repeat(500));
    expect(error.excerpt).toHaveLength(200);
  });
});
