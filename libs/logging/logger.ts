import pino from "pino";
import type { Change } from "../change/change.js";

import { REDACT_KEYS, REDACT_CENSOR } from "./redactionConfig.js";

export const logger = pino({
  level: process.env['LOG_LEVEL'] ?? "info",
  base: {
    system: "drift-attribution"
  },
  redact: {
    paths: REDACT_KEYS,
    censor: REDACT_CENSOR
  }
});

/**
 * Returns a child logger with the change identity attached.
 */
export function getChangeLogger(change: Change) {
  return logger.child({
    provider: change.provider,
    resourceType: change.resourceType,
    projectId: change.projectId
  });
}
