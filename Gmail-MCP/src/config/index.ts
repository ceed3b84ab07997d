import { loadEnvSafely } from "@foi-mailroom/shared/Utils/env.js";
loadEnvSafely(import.meta.url, 2);

import { ConfigSchema, type Config } from "./schema.js";
import { ConfigurationError } from "@foi-mailroom/shared/Types/errors.js";
import { logger } from "../utils/logger.js";
import {
  expandPath,
  getEnvString,
  getEnvNumber,
} from "@foi-mailroom/shared/Utils/config.js";

export function loadConfig(): Config {
  const rawConfig = {
    transport: getEnvString("TRANSPORT", "stdio"),
    port: getEnvNumber("PORT", 8008),
    authToken: getEnvString("MCP_AUTH_TOKEN"),

    gmail: {
      credentialsPath: expandPath(
        getEnvString("GMAIL_CREDENTIALS_PATH", "~/.foi-mailroom/gmail/credentials.json") ?? ""
      ),
      tokenPath: expandPath(
        getEnvString("GMAIL_TOKEN_PATH", "~/.foi-mailroom/gmail/token.json") ?? ""
      ),
      consentPort: getEnvNumber("GMAIL_CONSENT_PORT", 0),
      unreadQuery: getEnvString("GMAIL_UNREAD_QUERY", "is:unread in:inbox"),
    },

    logLevel: getEnvString("LOG_LEVEL", "info"),
  };

  const result = ConfigSchema.safeParse(rawConfig);

  if (!result.success) {
    const errors = result.error.flatten();
    logger.error("Configuration validation failed", errors);
    throw new ConfigurationError("Invalid configuration", errors);
  }

  logger.debug("Configuration loaded successfully");
  return result.data;
}

let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

export { type Config };
