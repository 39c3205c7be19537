import type { ClipboardText } from "./types";

// Canonical error codes used by the WebSocket control plane and HTTP responses.
export const ERROR_CODES = {
  INVALID_MESSAGE: "invalid_message",
  DUPLICATE_CLIENT: "duplicate_client",
  STALE_VERSION: "stale_version",
  PAYLOAD_TOO_LARGE: "payload_too_large",
  NOT_FOUND: "not_found",
  EXPIRED: "expired",
  TRANSPORT_FAILURE: "transport_failure",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

// Thrown for conditions the caller cannot recover from in-line.
export class BoardError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "BoardError";
    this.code = code;
  }
}

export function toBoardError(error: unknown, fallback: ErrorCode): BoardError {
  if (error instanceof BoardError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new BoardError(fallback, message);
}

export type StaleVersionError = {
  code: typeof ERROR_CODES.STALE_VERSION;
  current: ClipboardText;
};

export type PayloadTooLargeError = {
  code: typeof ERROR_CODES.PAYLOAD_TOO_LARGE;
  limitBytes: number;
  actualBytes: number;
  message: string;
};

export type NotFoundError = {
  code: typeof ERROR_CODES.NOT_FOUND;
  id: string;
};

export type ExpiredError = {
  code: typeof ERROR_CODES.EXPIRED;
  id: string;
  expiredAt: number;
};

// Expected outcomes of concurrent use are returned, not thrown.
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
