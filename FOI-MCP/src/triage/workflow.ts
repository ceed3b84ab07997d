/**
 * FOI triage: acknowledge each unread FOI request with a draft in its thread,
 * then hand the agent a prompt to allocate it to a team.
 */

import type { MailGateway } from "@foi-mailroom/shared/Gmail/gateway.js";
import { buildRawMessage, extractPlainText, getHeader } from "@foi-mailroom/shared/Gmail/mime.js";
import type { Logger } from "@foi-mailroom/shared/Utils/logger.js";
import { ValidationError } from "@foi-mailroom/shared/Types/errors.js";
import type { KnowledgeSource } from "../knowledge/loader.js";
import { logger as defaultLogger } from "../utils/logger.js";
import {
  acknowledgementBody,
  acknowledgementSubject,
  DEFAULT_ACKNOWLEDGEMENT,
  type AcknowledgementOptions,
} from "./acknowledgement.js";
import { containsFoiKeyword, type Classifier } from "./classifier.js";
import { buildAllocationPrompt } from "./prompt.js";
import { createReferenceGenerator, isCaseReference, type ReferenceGenerator } from "./reference.js";
import type { InternalDraftInput, TriagedMessage, TriageResult } from "../types/foi.js";

export const DEFAULT_MAX_UNREAD = 3;

export const NO_FOI_MESSAGES = "No unread FOI emails found.";
export const INTERNAL_DRAFT_CREATED = "Internal draft created.";

export interface TriageDependencies {
  gateway: MailGateway;
  knowledge: KnowledgeSource;
  classifier?: Classifier;
  nextReference?: ReferenceGenerator;
  /** Unread messages examined per run */
  maxUnread?: number;
  acknowledgement?: AcknowledgementOptions;
  logger?: Logger;
}

export class FoiTriageWorkflow {
  private readonly gateway: MailGateway;
  private readonly knowledge: KnowledgeSource;
  private readonly classifier: Classifier;
  private readonly nextReference: ReferenceGenerator;
  private readonly maxUnread: number;
  private readonly acknowledgement: AcknowledgementOptions;
  private readonly logger: Logger;

  constructor(deps: TriageDependencies) {
    this.gateway = deps.gateway;
    this.knowledge = deps.knowledge;
    this.classifier = deps.classifier ?? containsFoiKeyword;
    this.nextReference = deps.nextReference ?? createReferenceGenerator();
    this.maxUnread = deps.maxUnread ?? DEFAULT_MAX_UNREAD;
    this.acknowledgement = deps.acknowledgement ?? DEFAULT_ACKNOWLEDGEMENT;
    this.logger = deps.logger ?? defaultLogger.child("triage");
  }

  /**
   * Gateway and knowledge errors propagate; drafts created before the
   * failure are kept.
   */
  async processUnread(): Promise<TriageResult> {
    const teams = await this.knowledge.loadTeamDirectory();
    const library = await this.knowledge.loadLibrary();

    const refs = await this.gateway.listMessages({ labelIds: ["UNREAD"], maxResults: this.maxUnread });
    this.logger.info("Unread messages listed", { count: refs.length });

    const result: TriageResult = { prompts: [], processed: [], skipped: [] };

    for (const ref of refs) {
      const message = await this.gateway.getMessage(ref.id, { format: "full" });
      const subject = getHeader(message.headers, "Subject") ?? "";
      const sender = getHeader(message.headers, "From") ?? "";
      const body = extractPlainText(message.payload);

      if (!this.classifier(subject, body)) {
        this.logger.debug("Skipping non-FOI message", { id: message.id });
        result.skipped.push(message.id);
        continue;
      }

      const reference = this.nextReference();
      if (!isCaseReference(reference)) {
        throw new ValidationError(`Invalid case reference: ${reference}`);
      }
      const draft = await this.gateway.createDraft({
        raw: buildRawMessage({
          to: sender,
          subject: acknowledgementSubject(reference),
          body: acknowledgementBody(reference, this.acknowledgement),
        }),
        threadId: message.threadId,
      });
      this.logger.info("Acknowledgement draft created", { reference, threadId: message.threadId });

      result.prompts.push(
        buildAllocationPrompt({
          subject,
          body,
          library,
          teams,
          reference,
          threadId: message.threadId,
          organisation: this.acknowledgement.organisation,
        })
      );

      const triaged: TriagedMessage = {
        messageId: message.id,
        threadId: message.threadId,
        sender,
        subject,
        reference,
        acknowledgementDraftId: draft.draftId,
      };
      result.processed.push(triaged);
    }

    return result;
  }

  /**
   * Save the agent's allocation email as a draft in the request's thread
   */
  async composeInternalDraft(input: InternalDraftInput): Promise<string> {
    const draft = await this.gateway.createDraft({
      raw: buildRawMessage({ to: input.to, subject: input.subject, body: input.body }),
      threadId: input.thread_id,
    });
    this.logger.info("Internal draft created", { draftId: draft.draftId, threadId: input.thread_id });
    return INTERNAL_DRAFT_CREATED;
  }
}
