/**
 * Walletlist — src/lib/errors.ts
 * WHAT: Domain error classes plus a discriminated union for classifying anything caught.
 * WHY: Lets handlers pick the right reply and keeps Sentry free of expected noise.
 * FLOWS:
 *  - throw new ValidationError / PersistError / StartupError from the core
 *  - classifyError(err) → ClassifiedError union type
 *  - shouldReportToSentry(err) → boolean (filter noise)
 *  - userFriendlyMessage(err) → ephemeral reply text
 * USAGE:
 *  import { classifyError, userFriendlyMessage } from "./errors.js";
 *  const classified = classifyError(err);
 *  if (classified.kind === "validation") { ... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Thrown Error Classes =====

/** Bad input from the invoking actor (e.g. a non-positive cap). No state change. */
export class ValidationError extends Error {
  readonly kind = "validation" as const;

  constructor(
    readonly field: string,
    message: string,
    readonly value?: unknown
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Durable write failed. The store has already rolled memory back to the last
 * committed record by the time this reaches a caller.
 */
export class PersistError extends Error {
  readonly kind = "persist" as const;

  constructor(
    message: string,
    readonly target: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "PersistError";
  }
}

/** Durable storage exists but cannot be read or decoded. Fatal at boot. */
export class StartupError extends Error {
  readonly kind = "startup" as const;

  constructor(
    message: string,
    readonly target: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "StartupError";
  }
}

// ===== Classified Union =====

export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

/**
 * Discord API errors. Discord uses numeric codes (not HTTP status):
 * - 10062: Unknown Interaction (3s timeout expired)
 * - 40060: Already acknowledged
 * - 50013: Missing Permissions
 * - 50001: Missing Access
 * - 10011: Unknown Role
 */
export interface DiscordApiError extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

export interface ClassifiedValidationError extends AppError {
  kind: "validation";
  field: string;
  value?: unknown;
}

export interface ClassifiedPersistError extends AppError {
  kind: "persist";
  target: string;
}

export interface ClassifiedStartupError extends AppError {
  kind: "startup";
  target: string;
}

export interface PermissionError extends AppError {
  kind: "permission";
  needed: string[];
}

/** Node system errors; the request never completed. */
export interface NetworkError extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

export interface UnknownError extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | DiscordApiError
  | ClassifiedValidationError
  | ClassifiedPersistError
  | ClassifiedStartupError
  | PermissionError
  | NetworkError
  | UnknownError;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function readProp(err: object, key: string): unknown {
  return (err as Record<string, unknown>)[key];
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" ? value : undefined;
}

/**
 * Classify any caught value. Ordered from most specific to least: our own
 * classes, then Discord, then Node network errors, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (err === null || err === undefined) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;

  if (err instanceof ValidationError) {
    return { kind: "validation", field: err.field, value: err.value, message: err.message, cause };
  }
  if (err instanceof PersistError) {
    return { kind: "persist", target: err.target, message: err.message, cause };
  }
  if (err instanceof StartupError) {
    return { kind: "startup", target: err.target, message: err.message, cause };
  }

  if (typeof err !== "object") {
    return { kind: "unknown", message: String(err) };
  }

  const message = optionalString(readProp(err, "message")) ?? String(err);
  const code = readProp(err, "code");
  const name = optionalString(readProp(err, "name"));

  if (code === 50013) {
    return { kind: "permission", needed: ["Unknown"], message, cause };
  }
  if (code === 50001) {
    return { kind: "permission", needed: ["ViewChannel"], message, cause };
  }

  if (name === "DiscordAPIError" || (name?.includes("Discord") && typeof code === "number")) {
    return {
      kind: "discord_api",
      code: typeof code === "number" ? code : 0,
      httpStatus: optionalNumber(readProp(err, "status")) ?? optionalNumber(readProp(err, "httpStatus")),
      method: optionalString(readProp(err, "method")),
      path: optionalString(readProp(err, "url")) ?? optionalString(readProp(err, "path")),
      message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return {
      kind: "network",
      code,
      host: optionalString(readProp(err, "hostname")) ?? optionalString(readProp(err, "host")),
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * Sentry alerts should mean "something is actually broken", not
 * "Discord had a hiccup" or "user typed something odd".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // Unknown interaction (expired)
        40060, // Interaction already acknowledged
        10008, // Unknown message
        10003, // Unknown channel
        10011, // Unknown role
      ];
      return !ignoredCodes.includes(err.code);
    }
    case "network":
    case "validation":
    case "permission":
      return false;
    default:
      return true;
  }
}

export function isInteractionExpired(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 10062;
}

export function isAlreadyAcknowledged(err: ClassifiedError): boolean {
  return err.kind === "discord_api" && err.code === 40060;
}

// ===== Error Context Helpers =====

export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "discord_api":
      return { ...base, discordCode: err.code, httpStatus: err.httpStatus, method: err.method, path: err.path };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "permission":
      return { ...base, neededPerms: err.needed };
    case "validation":
      return { ...base, field: err.field };
    case "persist":
    case "startup":
      return { ...base, target: err.target };
    default:
      return base;
  }
}

/**
 * Text shown to the member in an ephemeral reply.
 */
export function userFriendlyMessage(err: ClassifiedError): string {
  switch (err.kind) {
    case "validation":
      return `Invalid ${err.field}: ${err.message}`;
    case "persist":
      return "Settings could not be saved. Nothing was changed; please try again.";
    case "startup":
      return "The bot's settings storage is unavailable.";
    case "discord_api":
      if (err.code === 10062) {
        return "This interaction has expired. Please try again.";
      }
      return "Discord API error occurred.";
    case "permission":
      return `Missing permissions: ${err.needed.join(", ")}`;
    case "network":
      return "Network error. Please try again.";
    default:
      return "An unexpected error occurred.";
  }
}
