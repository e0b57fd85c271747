/**
 * AWS Error Classification
 *
 * SDK exceptions are turned into the reconciler's typed error kinds here, at
 * the provider boundary, so nothing downstream has to look at error strings.
 */

import type { ApplyError, FetchError } from "./types.js";

/**
 * Extract error code from an error object
 */
export function extractErrorCode(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const code = "code" in err ? err.code : undefined;
  if (typeof code === "string") return code;
  if (typeof code === "number") return String(code);
  return undefined;
}

/**
 * Format error message from any error type
 */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message || err.name || "Error";
  }
  if (typeof err === "string") return err;
  if (typeof err === "number" || typeof err === "boolean" || typeof err === "bigint") {
    return String(err);
  }
  try {
    return JSON.stringify(err);
  } catch {
    return Object.prototype.toString.call(err);
  }
}

function errorName(err: unknown): string | undefined {
  if (!err || typeof err !== "object") return undefined;
  const name = "name" in err ? err.name : undefined;
  return typeof name === "string" ? name : undefined;
}

function httpStatusCode(err: unknown): number | undefined {
  if (!err || typeof err !== "object" || !("$metadata" in err)) return undefined;
  const metadata = err.$metadata;
  if (!metadata || typeof metadata !== "object" || !("httpStatusCode" in metadata)) return undefined;
  return typeof metadata.httpStatusCode === "number" ? metadata.httpStatusCode : undefined;
}

/**
 * AWS error codes that should always be retried
 */
const AWS_RETRYABLE_CODES = new Set([
  "ThrottlingException",
  "Throttling",
  "TooManyRequestsException",
  "RequestLimitExceeded",
  "ServiceUnavailable",
  "ServiceUnavailableException",
  "InternalError",
  "InternalServiceError",
  "InternalServerError",
  "SlowDown",
  "RequestThrottled",
  "BandwidthLimitExceeded",
  "RequestTimeout",
  "RequestTimeoutException",
  "PriorRequestNotComplete",
  "OperationAborted",
  "TimeoutError",
  "AbortError",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "ECONNREFUSED",
  "EPIPE",
]);

const RETRYABLE_STATUS = new Set([429, 500, 502, 503, 504]);

const PERMISSION_CODES = new Set(["AccessDenied", "AccessDeniedException", "AllAccessDisabled", "InvalidAccessKeyId", "SignatureDoesNotMatch", "ExpiredToken"]);

const NOT_FOUND_CODES = new Set(["NoSuchBucket", "NotFound"]);

/**
 * Determine if an AWS error is transient (throttling, 5xx, network)
 */
export function isTransientAWSError(err: unknown): boolean {
  if (!err) return false;

  const code = extractErrorCode(err);
  if (code && AWS_RETRYABLE_CODES.has(code)) return true;

  const name = errorName(err);
  if (name && AWS_RETRYABLE_CODES.has(name)) return true;

  const status = httpStatusCode(err);
  return status !== undefined && RETRYABLE_STATUS.has(status);
}

function isPermissionError(err: unknown): boolean {
  const name = errorName(err);
  const code = extractErrorCode(err);
  return (
    (name !== undefined && PERMISSION_CODES.has(name)) ||
    (code !== undefined && PERMISSION_CODES.has(code)) ||
    httpStatusCode(err) === 403
  );
}

/**
 * Classify a failed configuration read.
 *
 * Anything that is neither a missing bucket nor a permission problem is
 * treated as transient and left to the retry budget.
 */
export function classifyFetchError(err: unknown): FetchError {
  const name = errorName(err);
  const message = formatErrorMessage(err);
  if (name !== undefined && NOT_FOUND_CODES.has(name)) {
    return { kind: "NotFound", message, code: name };
  }
  if (isPermissionError(err)) {
    return { kind: "PermissionDenied", message, code: name ?? extractErrorCode(err) };
  }
  return { kind: "Transient", message, code: name ?? extractErrorCode(err) };
}

/**
 * Classify a failed configuration write. Only throttling, 5xx and network
 * failures are retried; everything else (permissions, malformed configuration,
 * missing bucket) is terminal.
 */
export function classifyApplyError(err: unknown): ApplyError {
  const message = formatErrorMessage(err);
  const code = errorName(err) ?? extractErrorCode(err);
  if (isTransientAWSError(err)) return { kind: "Transient", message, code };
  return { kind: "Terminal", message, code };
}
