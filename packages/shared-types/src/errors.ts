import type { ErrorInfo, ErrorKind, ErrorRemedy } from "./schema.js";

/** Transient kinds; everything else is structural and never retried */
export const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>(["NetworkUnavailable", "Timeout"]);

export const REMEDY_BY_KIND: Record<ErrorKind, ErrorRemedy> = {
  NetworkUnavailable: "retry_later",
  Timeout: "retry_now",
  ModelNotFound: "fix_configuration",
  InvalidResponse: "fix_configuration",
  ValidationFailed: "review_content",
  UpstreamError: "retry_later",
};

export function isRetryable(kind: ErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

export function makeErrorInfo(kind: ErrorKind, message: string): ErrorInfo {
  return { kind, message, retryable: isRetryable(kind), remedy: REMEDY_BY_KIND[kind] };
}
