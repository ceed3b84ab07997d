import { z } from "zod";
import type { GatewayMessage, MailGateway } from "@foi-mailroom/shared/Gmail/gateway.js";
import { buildRawMessage, getHeader, type MessageHeader } from "@foi-mailroom/shared/Gmail/mime.js";
import { errorMessage } from "@foi-mailroom/shared/Types/errors.js";
import { logger } from "../utils/logger.js";
import type { DraftReplyResult } from "../types/gmail.js";

/** Headers fetched from the original message to address and thread the reply */
export const REPLY_HEADERS = ["Subject", "From", "To", "Reply-To", "Message-Id"];

// ============ CREATE DRAFT REPLY ============

export const createDraftReplyTool = {
  name: "create_draft_reply",
  description:
    "Create a Gmail draft replying to a message. The draft is addressed to the original sender (Reply-To first), keeps a single 'Re:' subject prefix and stays in the original thread. Nothing is sent.",
};

export const CreateDraftReplyInputSchema = z.object({
  message_id: z.string().describe("Gmail message id of the email to reply to"),
  reply_body: z.string().describe("Plain text content of the reply"),
});

export type CreateDraftReplyInput = z.infer<typeof CreateDraftReplyInputSchema>;

/**
 * "Re:" prefix exactly once
 */
export function replySubject(subject: string): string {
  if (subject.toLowerCase().startsWith("re:")) {
    return subject;
  }
  return subject ? `Re: ${subject}` : "Re: (no subject)";
}

/**
 * Reply-To, then From, then To; empty headers are skipped
 */
export function pickRecipient(headers: readonly MessageHeader[]): string {
  return (
    getHeader(headers, "Reply-To") ||
    getHeader(headers, "From") ||
    getHeader(headers, "To") ||
    ""
  );
}

export async function createDraftReply(
  gateway: MailGateway,
  messageId: string,
  replyBody: string
): Promise<DraftReplyResult> {
  let original: GatewayMessage;
  try {
    original = await gateway.getMessage(messageId, { format: "metadata", headers: REPLY_HEADERS });
  } catch (error) {
    logger.error("Failed to load original message", { messageId, error });
    return { status: "error", error: `Failed to load original message: ${errorMessage(error)}` };
  }

  const originalMessageId = getHeader(original.headers, "Message-Id");
  const raw = buildRawMessage({
    to: pickRecipient(original.headers),
    subject: replySubject(getHeader(original.headers, "Subject") ?? ""),
    body: replyBody,
    inReplyTo: originalMessageId,
    references: originalMessageId,
  });

  try {
    const draft = await gateway.createDraft({ raw, threadId: original.threadId || undefined });
    const threadId = draft.threadId || original.threadId;
    logger.info("Created reply draft", { draftId: draft.draftId, threadId });
    return { status: "ok", draft_id: draft.draftId, thread_id: threadId };
  } catch (error) {
    logger.error("Failed to create draft", { messageId, error });
    return { status: "error", error: `Failed to create draft: ${errorMessage(error)}` };
  }
}
