/**
 * Structured error values shared by the remote client, the local store and
 * the HTTP layer.
 */

export const ERROR_FORMAT_VERSION = "1.0.0";

export type ErrorKind =
  | "transport"
  | "upstream"
  | "validation"
  | "store"
  | "aborted";

export interface ErrorMessageItem {
  message: string;
}

export interface ErrorDetail {
  kind: ErrorKind;
  title: string;
  statusCode: number;
  detail: string;
  version: string;
  errorMessages: ErrorMessageItem[];
}

const STATUS_TITLES: Record<number, string> = {
  400: "Bad Request",
  401: "Unauthorized",
  403: "Forbidden",
  404: "Not Found",
};

export function statusTitle(status: number): string {
  return STATUS_TITLES[status] ?? `HTTP ${status}`;
}

/** Network unreachable, timeout, aborted connection. Retryable on the next pass. */
export function transportError(cause: unknown): ErrorDetail {
  return {
    kind: "transport",
    title: "Network Error",
    statusCode: 503,
    detail: errorMessage(cause),
    version: ERROR_FORMAT_VERSION,
    errorMessages: [{ message: "Could not reach upstream API" }],
  };
}

/** The remote system answered with a non-2xx status. */
export function upstreamError(status: number, body: string): ErrorDetail {
  return {
    kind: "upstream",
    title: statusTitle(status),
    statusCode: status,
    detail: `Upstream API returned status ${status}`,
    version: ERROR_FORMAT_VERSION,
    errorMessages: [{ message: body }],
  };
}

export function validationError(
  detail: string,
  messages: string[],
  statusCode = 422,
): ErrorDetail {
  return {
    kind: "validation",
    title: statusCode === 400 ? "Bad Request" : "Validation Error",
    statusCode,
    detail,
    version: ERROR_FORMAT_VERSION,
    errorMessages: messages.map((message) => ({ message })),
  };
}

export function storeError(operation: string, cause: unknown): ErrorDetail {
  return {
    kind: "store",
    title: "Local Store Error",
    statusCode: 500,
    detail: `Local store ${operation} failed`,
    version: ERROR_FORMAT_VERSION,
    errorMessages: [{ message: errorMessage(cause) }],
  };
}

/** The pass was stopped between pages by its owner's abort signal. */
export function abortedError(): ErrorDetail {
  return {
    kind: "aborted",
    title: "Sync Aborted",
    statusCode: 503,
    detail: "Synchronization stopped before the remote stream was exhausted",
    version: ERROR_FORMAT_VERSION,
    errorMessages: [],
  };
}

export function isRetryableDetail(error: ErrorDetail): boolean {
  if (error.kind === "transport") return true;
  if (error.kind !== "upstream") return false;
  return error.statusCode === 429 || error.statusCode >= 500;
}

/** One-line rendering used in logs and sync results. */
export function describeError(error: ErrorDetail): string {
  const messages = error.errorMessages.map((m) => m.message).join("; ");
  return messages
    ? `${error.title} (${error.statusCode}): ${error.detail} - ${messages}`
    : `${error.title} (${error.statusCode}): ${error.detail}`;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
