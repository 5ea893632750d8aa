import { getLogger, type Logger } from "./logger";

/**
 * Logger for one component of a subsystem, named `subsystem:component`.
 * Resolved against the global logger at call time, so it follows
 * `configureLogger`.
 */
export function createSubsystemLogger(subsystem: string, component?: string): Logger {
  return getLogger(component ? `${subsystem}:${component}` : subsystem);
}
