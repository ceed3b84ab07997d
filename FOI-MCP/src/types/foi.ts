/**
 * FOI triage types
 */

/** One previously published FOI response */
export interface HistoricalResponseRecord {
  identifier: string;
  title: string;
  text: string;
  link: string;
}

/** Team name to the officer address that receives allocations */
export type TeamDirectory = Map<string, string>;

/** `CAM` followed by four digits */
export type CaseReference = string;

export interface TriagedMessage {
  messageId: string;
  threadId: string;
  sender: string;
  subject: string;
  reference: CaseReference;
  acknowledgementDraftId: string;
}

export interface TriageResult {
  /** One allocation prompt per FOI message, in mailbox order */
  prompts: string[];
  processed: TriagedMessage[];
  /** Ids of unread messages that were not FOI requests */
  skipped: string[];
}

export interface InternalDraftInput {
  to: string;
  subject: string;
  body: string;
  thread_id: string;
}
