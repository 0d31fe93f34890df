/**
 * Walletlist — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture/contexts.
 * WHY: Centralizes error tracking with safe shutdown and guardrails when DSN is invalid.
 * FLOWS: initializeSentry() → isSentryEnabled → captureException/addBreadcrumb → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import {
  consoleIntegration,
  onUncaughtExceptionIntegration,
  onUnhandledRejectionIntegration,
} from "@sentry/node";
import fs from "node:fs";
import path from "node:path";
import { logger } from "./logger.js";

let sentryEnabled = false;

export type SentryOptions = {
  dsn?: string;
  environment: string;
  tracesSampleRate: number;
};

export function hasValidDsn(dsn: string | undefined): dsn is string {
  // https://{key}@{org}.ingest.sentry.io/{project}; structure only, no network check.
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

function getVersion(): string {
  try {
    const packagePath = path.join(process.cwd(), "package.json");
    const packageJson: unknown = JSON.parse(fs.readFileSync(packagePath, "utf-8"));
    if (packageJson && typeof packageJson === "object" && "version" in packageJson) {
      return String(packageJson.version);
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}

/**
 * Initialize Sentry error tracking.
 * Only activates with a well-formed DSN and never under Vitest.
 */
export function initializeSentry(options: SentryOptions): void {
  if (process.env.VITEST_WORKER_ID) {
    return;
  }

  if (!hasValidDsn(options.dsn)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: options.dsn,
      environment: options.environment,
      release: `walletlist-bot@${getVersion()}`,
      tracesSampleRate: options.tracesSampleRate,
      integrations: [
        consoleIntegration({ levels: ["error", "warn"] }),
        onUncaughtExceptionIntegration({
          onFatalError: async (err: Error) => {
            logger.fatal({ err }, "Uncaught exception detected by Sentry");
            process.exit(1);
          },
        }),
        onUnhandledRejectionIntegration({ mode: "warn" }),
      ],
      beforeSend(event) {
        if (event.message) {
          event.message = event.message.replace(
            /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g,
            "[REDACTED_TOKEN]"
          );
        }
        return event;
      },
      // Operational noise; logged separately with more context.
      ignoreErrors: ["DiscordAPIError", "AbortError", "ECONNRESET", "ETIMEDOUT", "ENOTFOUND"],
    });

    sentryEnabled = true;
    logger.info({ environment: options.environment }, "Sentry initialized");
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

export function addBreadcrumb(breadcrumb: {
  message: string;
  category?: string;
  level?: Sentry.SeverityLevel;
  data?: Record<string, unknown>;
}): void {
  if (!sentryEnabled) return;

  Sentry.addBreadcrumb(breadcrumb);
}

export function setUser(user: { id: string; username?: string }): void {
  if (!sentryEnabled) return;

  Sentry.setUser(user);
}

export function setTag(key: string, value: string): void {
  if (!sentryEnabled) return;

  Sentry.setTag(key, value);
}

/**
 * Flush pending events before shutdown.
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;

  try {
    return await Sentry.flush(timeout);
  } catch (err) {
    logger.warn({ err }, "Sentry flush failed");
    return false;
  }
}
