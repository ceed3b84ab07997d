/**
 * Logger for FOI MCP
 * Re-exports the shared Logger to avoid duplicating the implementation.
 */

export { Logger } from "@foi-mailroom/shared/Utils/logger.js";
export type { LogLevel } from "@foi-mailroom/shared/Utils/logger.js";

import { Logger } from "@foi-mailroom/shared/Utils/logger.js";

/** Default logger instance */
export const logger = new Logger("foi");
