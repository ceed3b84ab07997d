#!/usr/bin/env node

import { getConfig } from "./config/index.js";
import { createServer } from "./server.js";
import { createToolMap } from "./tools/index.js";
import { createCsvKnowledgeSource } from "./knowledge/loader.js";
import { FoiTriageWorkflow } from "./triage/workflow.js";
import { logger } from "./utils/logger.js";
import { FileCredentialStore } from "@foi-mailroom/shared/Gmail/credentials.js";
import { GmailAuthorizer } from "@foi-mailroom/shared/Gmail/auth.js";
import { GmailGateway } from "@foi-mailroom/shared/Gmail/gateway.js";
import { startTransport, exitOnSignals } from "@foi-mailroom/shared/Transport/dual-transport.js";

async function main(): Promise<void> {
  const config = getConfig();
  logger.setLevel(config.logLevel);

  logger.info("Starting FOI MCP", {
    transport: config.transport,
    port: config.port,
    library: config.foi.libraryPath,
    teams: config.foi.teamsPath,
  });

  const store = new FileCredentialStore(
    config.gmail.tokenPath,
    config.gmail.credentialsPath,
    logger.child("credentials")
  );
  const authorizer = new GmailAuthorizer(store, {
    consentPort: config.gmail.consentPort,
    logger: logger.child("auth"),
  });

  let hasToken = await authorizer.hasStoredToken();
  if (!hasToken) {
    logger.warn("No Gmail token found. The first tool call will start the authorization flow.", {
      tokenPath: store.describe(),
    });
  }

  const gateway = new GmailGateway(async () => {
    const client = await authorizer.authorize();
    hasToken = true;
    return client;
  }, logger.child("gateway"));

  const workflow = new FoiTriageWorkflow({
    gateway,
    knowledge: createCsvKnowledgeSource({
      libraryPath: config.foi.libraryPath,
      teamsPath: config.foi.teamsPath,
      libraryLimit: config.foi.libraryLimit,
    }),
    maxUnread: config.foi.maxUnread,
    acknowledgement: {
      organisation: config.foi.organisation,
      signature: config.foi.signature,
      responseDays: config.foi.responseDays,
    },
  });
  const tools = createToolMap(workflow);

  const transport = await startTransport(createServer(workflow), {
    transport: config.transport,
    port: config.port,
    serverName: "gmail-foi",
    token: config.authToken,
    tools,
    onHealth: () => ({ hasToken, toolCount: Object.keys(tools).length }),
    log: (message: string, data?: unknown) => logger.info(message, data),
  });

  exitOnSignals(transport, (error) => logger.error("Shutdown failed", { error }));
}

main().catch((error: unknown) => {
  logger.error("Fatal error", { error });
  process.exit(1);
});
