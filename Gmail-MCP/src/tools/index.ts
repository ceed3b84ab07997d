import type { MailGateway } from "@foi-mailroom/shared/Gmail/gateway.js";
import { toolEntry, type ToolMapEntry } from "@foi-mailroom/shared/Types/tools.js";
import { getUnreadTool, GetUnreadInputSchema, getUnread, DEFAULT_UNREAD_QUERY } from "./messages.js";
import {
  createDraftReplyTool,
  CreateDraftReplyInputSchema,
  createDraftReply,
} from "./drafts.js";

export * from "./messages.js";
export * from "./drafts.js";

export interface GmailToolDeps {
  gateway: MailGateway;
  /** Gmail search used by get_unread */
  unreadQuery?: string;
}

/**
 * Tools reachable through the HTTP /tools/call endpoint
 */
export function createToolMap(deps: GmailToolDeps): Record<string, ToolMapEntry> {
  const query = deps.unreadQuery ?? DEFAULT_UNREAD_QUERY;
  return {
    [getUnreadTool.name]: toolEntry(getUnreadTool.description, GetUnreadInputSchema, ({ limit }) =>
      getUnread(deps.gateway, limit, query)
    ),
    [createDraftReplyTool.name]: toolEntry(
      createDraftReplyTool.description,
      CreateDraftReplyInputSchema,
      ({ message_id, reply_body }) => createDraftReply(deps.gateway, message_id, reply_body)
    ),
  };
}
