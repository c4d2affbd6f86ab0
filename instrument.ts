import * as Sentry from "@sentry/node";
import { config } from "dotenv";

// Imported first by every script under scripts/, so .env.local is loaded
// before anything reads process.env. Without SENTRY_DSN the client is
// disabled and logger calls are dropped.
config({ path: ".env.local" });

Sentry.init({
  dsn: process.env.SENTRY_DSN,

  // Enable structured logging
  enableLogs: true,

  integrations: [
    // Console integration - captures console.log, console.warn, console.error
    Sentry.consoleLoggingIntegration({
      levels: ["warn", "error"],
    }),
  ],

  // Dataset runs are batch jobs; keep every trace in development
  tracesSampleRate: process.env.NODE_ENV === "production" ? 0.1 : 1.0,

  debug: false,
});
