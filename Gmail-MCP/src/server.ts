import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerTool } from "@foi-mailroom/shared/Utils/register-tool.js";
import {
  getUnreadTool,
  GetUnreadInputSchema,
  getUnread,
  createDraftReplyTool,
  CreateDraftReplyInputSchema,
  createDraftReply,
  DEFAULT_UNREAD_QUERY,
  type GmailToolDeps,
} from "./tools/index.js";
import { logger } from "./utils/logger.js";

export function createServer(deps: GmailToolDeps): McpServer {
  const server = new McpServer({
    name: "gmail-mcp",
    version: "1.0.0",
  });
  const query = deps.unreadQuery ?? DEFAULT_UNREAD_QUERY;

  registerTool(server, {
    name: getUnreadTool.name,
    description: getUnreadTool.description,
    inputSchema: GetUnreadInputSchema,
    annotations: {
      readOnlyHint: true,
      destructiveHint: false,
      idempotentHint: true,
      openWorldHint: true,
    },
    logger,
    handler: ({ limit }) => getUnread(deps.gateway, limit, query),
  });

  registerTool(server, {
    name: createDraftReplyTool.name,
    description: createDraftReplyTool.description,
    inputSchema: CreateDraftReplyInputSchema,
    annotations: {
      readOnlyHint: false,
      destructiveHint: false,
      idempotentHint: false,
      openWorldHint: true,
    },
    logger,
    handler: ({ message_id, reply_body }) => createDraftReply(deps.gateway, message_id, reply_body),
  });

  return server;
}
