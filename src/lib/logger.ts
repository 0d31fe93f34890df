/**
 * Walletlist — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * WHY: Centralizes structured logging to keep other modules clean.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - pino: https://getpino.io
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

/**
 * Token pattern: Discord bot tokens are 3 base64-ish segments separated by dots.
 * DSN pattern: Sentry DSNs embed the key in the URL userinfo.
 * Mention pattern: @everyone/@here coming from user input.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const dsnRe = /(https?:\/\/)([^:@]+):[^@]+@/gi;
const mentionRe = /@(everyone|here)/gi;

let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on any user-controlled value
 * (wallet addresses included). Truncates at 300 chars.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

type SerializedError = {
  name?: string;
  code?: unknown;
  message?: string;
  stack?: string;
};

function serializeError(e: unknown): SerializedError {
  if (e instanceof Error) {
    return {
      name: e.name,
      code: (e as { code?: unknown }).code,
      message: e.message,
      stack: e.stack,
    };
  }
  return { message: String(e) };
}

const logLevel = process.env.LOG_LEVEL ?? "info";
const wantPretty = process.env.LOG_PRETTY === "true" && process.stdout.isTTY;

export const logger = pino({
  level: logLevel,
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : {}),
  base: undefined,
  // discord.js errors carry circular refs; keep only the useful fields.
  serializers: {
    err: serializeError,
  },
  /**
   * Error-level logs that carry an Error are forwarded to Sentry, so callers
   * only ever need logger.error().
   */
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const firstArg: unknown = args[0];
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : firstArg && typeof firstArg === "object" && "err" in firstArg
              ? (firstArg as { err?: unknown }).err
              : undefined;

        if (errorCandidate instanceof Error) {
          const message = typeof args[1] === "string" ? args[1] : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // Dynamic import keeps Sentry optional and avoids a cycle with sentry.ts.
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn(
                  "[logger] Failed to import Sentry module:",
                  importErr instanceof Error ? importErr.message : importErr
                );
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});
