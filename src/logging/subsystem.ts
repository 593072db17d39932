// ---------------------------------------------------------------------------
// Subsystem loggers – LogTape categories under ["tracklet", <subsystem>]
// ---------------------------------------------------------------------------

import { getLogger } from "@logtape/logtape";

export type SubsystemLogger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export const ROOT_CATEGORY = "tracklet";

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const logger = getLogger([ROOT_CATEGORY, subsystem]);
  // Text goes in a property, never the template: it may contain "{...}".
  return {
    info: (msg) => logger.info("{message}", { message: msg }),
    warn: (msg) => logger.warn("{message}", { message: msg }),
    error: (msg) => logger.error("{message}", { message: msg }),
  };
}
