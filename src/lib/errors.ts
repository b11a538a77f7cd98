/**
 * src/lib/errors.ts
 * WHAT: Scheduler error classes plus a discriminated-union classifier for foreign errors.
 * WHY: Dispatch needs to tell "retry later" from "never going to work" regardless of
 *      whether a handler threw one of our classes, a SqliteError or a DiscordAPIError.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isRecoverable(err) → boolean (worth retrying)
 *  - isTransientHandlerFailure(err) → boolean (dispatch retry decision)
 * USAGE:
 *  import { HandlerTransientError, isTransientHandlerFailure } from "./errors.js";
 *  throw new HandlerTransientError("channel fetch timed out", { cause: err });
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Scheduler Error Classes =====

/**
 * The store is unreachable or rejected a write (constraint violation, unknown guild).
 * `code` carries the SQLite code when there is one, so classifyError() still sees it
 * as a db_error after wrapping.
 */
export class PersistenceError extends Error {
  readonly code: string;

  constructor(message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "PersistenceError";
    this.code = options.code ?? "UNKNOWN";
  }
}

/**
 * Wiring defect: duplicate handler registration, registration after start,
 * or a due timer whose event kind has no handler.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly eventKind?: string
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Thrown by a handler when the event may succeed if tried again later. */
export class HandlerTransientError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "HandlerTransientError";
  }
}

/** Thrown by a handler when the event can never succeed. */
export class HandlerPermanentError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, options);
    this.name = "HandlerPermanentError";
  }
}

// ===== Classified Error Union =====

/**
 * The `kind` field is the discriminator; it narrows in switch statements and,
 * unlike instanceof, works for errors from other module copies.
 */
export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * SQLite errors. SQLITE_BUSY/SQLITE_LOCKED are transient, SQLITE_CONSTRAINT_* are
 * logic errors, SQLITE_CORRUPT/SQLITE_NOTADB are fatal.
 */
export interface DbError extends AppError {
  kind: "db_error";
  code: string;
}

/**
 * Discord API errors (numeric JSON codes, not HTTP status).
 * - 10003: Unknown Channel
 * - 50001: Missing Access
 * - 50007: Cannot send messages to this user
 * - 50013: Missing Permissions
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
}

/** Node.js socket-level failures. Almost always worth retrying. */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError = DbError | DiscordApiError | NetworkError | UnknownError;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function readProp(err: object, key: string): unknown {
  return key in err ? Reflect.get(err, key) : undefined;
}

/**
 * Classify any caught value. Ordered from most to least specific:
 * SQLite, then Discord, then network, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }
  if (typeof err !== "object") {
    return { kind: "unknown", message: String(err) };
  }

  const rawMessage = readProp(err, "message");
  const message = typeof rawMessage === "string" ? rawMessage : String(err);
  const code = readProp(err, "code");
  const rawName = readProp(err, "name");
  const name = typeof rawName === "string" ? rawName : undefined;
  const cause = err instanceof Error ? err : undefined;

  if (name === "SqliteError" || (typeof code === "string" && code.startsWith("SQLITE_"))) {
    return { kind: "db_error", code: typeof code === "string" ? code : "UNKNOWN", message, cause };
  }

  if (typeof code === "number" && (name === "DiscordAPIError" || name?.includes("Discord"))) {
    const status = readProp(err, "status") ?? readProp(err, "httpStatus");
    return {
      kind: "discord_api",
      code,
      httpStatus: typeof status === "number" ? status : undefined,
      message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return { kind: "network", code, message, cause };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Conservative: a false positive here means a timer burns its whole retry budget
 * on something that was never going to work.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "network":
      return true;

    case "db_error":
      return err.code === "SQLITE_BUSY" || err.code === "SQLITE_LOCKED";

    case "discord_api": {
      const status = err.httpStatus ?? 0;
      return status >= 500 && status < 600;
    }

    default:
      return false;
  }
}

export function isConstraintViolation(err: ClassifiedError): boolean {
  return err.kind === "db_error" && err.code.startsWith("SQLITE_CONSTRAINT");
}

/**
 * Dispatch retry decision for anything a handler throws.
 * Our own classes are authoritative; foreign errors go through classifyError().
 */
export function isTransientHandlerFailure(err: unknown): boolean {
  if (err instanceof HandlerTransientError) return true;
  if (err instanceof HandlerPermanentError) return false;
  if (err instanceof ConfigurationError) return false;
  return isRecoverable(classifyError(err));
}

/**
 * Short one-line description for dead-letter rows and log fields.
 */
export function describeError(err: unknown): string {
  const classified = classifyError(err);
  const name = err instanceof Error ? err.name : classified.kind;
  return `${name}: ${classified.message}`.slice(0, 500);
}
