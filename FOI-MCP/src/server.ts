import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerTextTool } from "@foi-mailroom/shared/Utils/register-tool.js";
import type { FoiTriageWorkflow } from "./triage/workflow.js";
import {
  processUnreadFoiTool,
  ProcessUnreadFoiInputSchema,
  handleProcessUnreadFoi,
  composeInternalDraftTool,
  ComposeInternalDraftInputSchema,
  handleComposeInternalDraft,
} from "./tools/index.js";
import { logger } from "./utils/logger.js";

export function createServer(workflow: FoiTriageWorkflow): McpServer {
  const server = new McpServer({
    name: "gmail-foi",
    version: "1.0.0",
  });

  registerTextTool(server, {
    name: processUnreadFoiTool.name,
    description: processUnreadFoiTool.description,
    inputSchema: ProcessUnreadFoiInputSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: true,
    },
    logger,
    handler: () => handleProcessUnreadFoi(workflow),
  });

  registerTextTool(server, {
    name: composeInternalDraftTool.name,
    description: composeInternalDraftTool.description,
    inputSchema: ComposeInternalDraftInputSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: true,
    },
    logger,
    handler: (input) => handleComposeInternalDraft(workflow, input),
  });

  return server;
}
