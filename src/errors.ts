export type ProxyErrorCode =
  | "body_required"
  | "invalid_json"
  | "body_must_be_json_object"
  | "model_required"
  | "unknown_model"
  | "invalid_header_value"
  | "upstream_rejected"
  | "access_token_required"
  | "upstream_unreachable"
  | "session_id_failed"
  | "challenge_failed"
  | "unknown";

export class ProxyError extends Error {
  public code: ProxyErrorCode;
  public details?: Record<string, unknown>;

  public constructor(code: ProxyErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "ProxyError";
    this.code = code;
    this.details = details;
  }
}

export function isProxyError(value: unknown): value is ProxyError {
  return value instanceof ProxyError;
}

export function toProxyError(
  value: unknown,
  fallbackCode: ProxyErrorCode = "unknown",
  fallbackMessage = "Unknown proxy error",
): ProxyError {
  if (isProxyError(value)) {
    return value;
  }

  if (value instanceof Error) {
    return new ProxyError(fallbackCode, value.message || fallbackMessage, { cause: value.name });
  }

  return new ProxyError(fallbackCode, fallbackMessage, {
    value: typeof value === "string" ? value : JSON.stringify(value),
  });
}

export function statusForProxyError(error: ProxyError): number {
  switch (error.code) {
    case "body_required":
    case "invalid_json":
    case "body_must_be_json_object":
    case "model_required":
    case "unknown_model":
    case "invalid_header_value":
      return 400;
    case "upstream_rejected":
      // The upstream refused the sentinel call; surface it as the caller's problem
      // so the upstream's own rejection stays visible.
      return 400;
    case "access_token_required":
      return 401;
    case "upstream_unreachable":
    case "session_id_failed":
    case "challenge_failed":
    case "unknown":
    default:
      return 500;
  }
}
