/**
 * Sentry Instrumentation Bootstrap
 *
 * This file MUST be loaded BEFORE any other application code.
 * It sets up Sentry, whose OpenTelemetry integration provides the spans
 * the logger and tool dispatch report against.
 *
 * Usage:
 *   node --import ./dist/instrumentation.js dist/index.js
 */

import "dotenv/config";
import * as Sentry from "@sentry/node";

const SENTRY_DSN = process.env.STACKPILOT_SENTRY_DSN;
const SENTRY_TRACES_SAMPLE_RATE = parseFloat(
  process.env.STACKPILOT_SENTRY_TRACES_SAMPLE_RATE ?? "1.0"
);
const NODE_ENV = process.env.NODE_ENV ?? "development";
const SERVICE_NAME = "stackpilot-mcp";
const SERVICE_VERSION = process.env.npm_package_version ?? "0.5.1";

if (SENTRY_DSN) {
  Sentry.init({
    dsn: SENTRY_DSN,
    tracesSampleRate: SENTRY_TRACES_SAMPLE_RATE,
    environment: NODE_ENV,
    release: `${SERVICE_NAME}@${SERVICE_VERSION}`,
    serverName: process.env.HOSTNAME ?? "local",
    attachStacktrace: true,
    debug: NODE_ENV === "development" && process.env.STACKPILOT_SENTRY_DEBUG === "true",

    // The Portainer token travels in X-API-Key; never ship it
    beforeSend(event) {
      if (event.request?.cookies) {
        event.request.cookies = {};
      }
      if (event.request?.headers) {
        delete event.request.headers.authorization;
        delete event.request.headers["x-api-key"];
        delete event.request.headers.cookie;
      }
      return event;
    },

    beforeBreadcrumb(breadcrumb) {
      if (breadcrumb.category === "console" && NODE_ENV === "development") {
        return null;
      }
      return breadcrumb;
    },
  });

  Sentry.setTag("service", SERVICE_NAME);
  Sentry.validateOpenTelemetrySetup();
} else if (NODE_ENV === "production") {
  process.stderr.write(
    "[instrumentation] STACKPILOT_SENTRY_DSN not set - Sentry disabled in production\n"
  );
}

export { Sentry };
