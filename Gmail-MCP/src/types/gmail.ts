/**
 * Tool result shapes. Field names are snake_case as the agent sees them.
 */

export interface EmailSummary {
  id: string;
  thread_id: string;
  /** Raw From header */
  sender: string;
  subject: string;
  snippet: string;
}

export type DraftReplyResult =
  | { status: "ok"; draft_id: string; thread_id: string }
  | { status: "error"; error: string };
