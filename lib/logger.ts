import * as Sentry from "@sentry/node";

/**
 * Structured logger using Sentry.logger
 *
 * Logs are only shipped once `instrument.ts` has initialised Sentry with
 * `enableLogs`; before that every call is a no-op, which keeps the engine
 * and its tests silent.
 *
 * @example
 * ```ts
 * import { logger } from "@/lib/logger";
 *
 * logger.info("Variants generated", { paperId: "p1", count: 6 });
 * logger.warn("Variant failed", { paperId: "p1", variant: "no_methods" });
 * logger.error("Dataset load failed", { path, error: err.message });
 *
 * // Template literal formatting (creates searchable attributes)
 * logger.info(fmt`Paper ${paperId} discarded in strict mode`);
 * ```
 */
export const logger = Sentry.logger;

// Re-export for template literal formatting
export const fmt = Sentry.logger.fmt;
