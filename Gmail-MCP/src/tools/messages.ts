import { z } from "zod";
import type { MailGateway, MessageRef } from "@foi-mailroom/shared/Gmail/gateway.js";
import { getHeader } from "@foi-mailroom/shared/Gmail/mime.js";
import { errorMessage } from "@foi-mailroom/shared/Types/errors.js";
import { logger } from "../utils/logger.js";
import type { EmailSummary } from "../types/gmail.js";

export const DEFAULT_UNREAD_QUERY = "is:unread in:inbox";

// ============ GET UNREAD ============

export const getUnreadTool = {
  name: "get_unread",
  description:
    "List unread emails in the inbox. Returns id, thread_id, sender, subject and snippet for each. Use the id with create_draft_reply to answer a message.",
};

export const GetUnreadInputSchema = z.object({
  limit: z
    .number()
    .int()
    .min(1)
    .default(5)
    .describe("Maximum number of unread emails to return (default: 5)"),
});

export type GetUnreadInput = z.infer<typeof GetUnreadInputSchema>;

/**
 * Never throws: a listing failure becomes a single error-shaped entry and a
 * failed fetch replaces only that message's entry.
 */
export async function getUnread(
  gateway: MailGateway,
  limit = 5,
  query = DEFAULT_UNREAD_QUERY
): Promise<EmailSummary[]> {
  let refs: MessageRef[];
  try {
    refs = await gateway.listMessages({ query, maxResults: limit });
  } catch (error) {
    logger.error("Failed to list unread emails", { error });
    return [
      {
        id: "",
        thread_id: "",
        sender: "",
        subject: "Error while listing unread emails",
        snippet: errorMessage(error),
      },
    ];
  }

  const results: EmailSummary[] = [];
  for (const ref of refs) {
    try {
      const message = await gateway.getMessage(ref.id, { format: "full" });
      results.push({
        id: message.id,
        thread_id: message.threadId,
        sender: getHeader(message.headers, "From") ?? "",
        subject: getHeader(message.headers, "Subject") ?? "",
        snippet: message.snippet,
      });
    } catch (error) {
      logger.warn("Failed to load message", { id: ref.id, error });
      results.push({
        id: ref.id,
        thread_id: "",
        sender: "",
        subject: "Error loading this message",
        snippet: errorMessage(error),
      });
    }
  }

  logger.info("Listed unread emails", { count: results.length });
  return results;
}
