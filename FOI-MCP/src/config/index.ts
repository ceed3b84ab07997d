import { loadEnvSafely } from "@foi-mailroom/shared/Utils/env.js";
loadEnvSafely(import.meta.url, 2);

import { fileURLToPath } from "node:url";
import { ConfigSchema, type Config } from "./schema.js";
import { ConfigurationError } from "@foi-mailroom/shared/Types/errors.js";
import { logger } from "../utils/logger.js";
import {
  expandPath,
  getEnvString,
  getEnvNumber,
} from "@foi-mailroom/shared/Utils/config.js";

/** Knowledge files shipped with the package */
const DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

export function loadConfig(): Config {
  const rawConfig = {
    transport: getEnvString("TRANSPORT", "stdio"),
    port: getEnvNumber("PORT", 8009),
    authToken: getEnvString("MCP_AUTH_TOKEN"),

    gmail: {
      credentialsPath: expandPath(
        getEnvString("GMAIL_CREDENTIALS_PATH", "~/.foi-mailroom/gmail/credentials.json") ?? ""
      ),
      tokenPath: expandPath(
        getEnvString("GMAIL_TOKEN_PATH", "~/.foi-mailroom/gmail/token.json") ?? ""
      ),
      consentPort: getEnvNumber("GMAIL_CONSENT_PORT", 0),
    },

    foi: {
      libraryPath: expandPath(getEnvString("FOI_LIBRARY_PATH", `${DATA_DIR}foi_responses.csv`) ?? ""),
      teamsPath: expandPath(getEnvString("FOI_TEAMS_PATH", `${DATA_DIR}team_contacts.csv`) ?? ""),
      libraryLimit: getEnvNumber("FOI_LIBRARY_LIMIT", 50),
      maxUnread: getEnvNumber("FOI_MAX_UNREAD", 3),
      organisation: getEnvString("FOI_ORGANISATION", "London Borough of Camden"),
      signature: getEnvString("FOI_TEAM_SIGNATURE", "Information Rights Team"),
      responseDays: getEnvNumber("FOI_RESPONSE_DAYS", 20),
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
