/**
 * Mail Gateway: the three Gmail operations the servers need (list, get,
 * create draft) behind an interface the workflows depend on.
 */

import { google, type gmail_v1 } from 'googleapis';
import type { OAuth2Client } from 'google-auth-library';
import { MailGatewayError, errorMessage } from '../Types/errors.js';
import { Logger } from '../Utils/logger.js';
import type { MessageHeader, MessagePart } from './mime.js';

export interface MessageRef {
  id: string;
  threadId: string;
}

export interface ListMessagesOptions {
  /** Gmail search syntax, e.g. "is:unread in:inbox" */
  query?: string;
  labelIds?: string[];
  maxResults: number;
}

export type MessageProjection =
  | { format: 'full' }
  | { format: 'metadata'; headers: string[] };

export interface GatewayMessage {
  id: string;
  threadId: string;
  snippet: string;
  headers: MessageHeader[];
  payload: MessagePart | null;
}

export interface DraftRequest {
  /** base64url-encoded RFC 822 message */
  raw: string;
  threadId?: string;
}

export interface CreatedDraft {
  draftId: string;
  messageId: string;
  threadId: string;
}

export interface MailGateway {
  listMessages(options: ListMessagesOptions): Promise<MessageRef[]>;
  getMessage(id: string, projection: MessageProjection): Promise<GatewayMessage>;
  createDraft(request: DraftRequest): Promise<CreatedDraft>;
}

function toHeaders(headers: gmail_v1.Schema$MessagePartHeader[] | undefined): MessageHeader[] {
  return (headers ?? []).flatMap((h) =>
    h.name ? [{ name: h.name, value: h.value ?? '' }] : []
  );
}

/**
 * Gmail REST implementation. Authorization runs on first use and the API
 * client is kept for the life of the process.
 */
export class GmailGateway implements MailGateway {
  private client: gmail_v1.Gmail | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly authorize: () => Promise<OAuth2Client>,
    logger?: Logger
  ) {
    this.logger = logger ?? new Logger('gmail-gateway');
  }

  private async gmail(): Promise<gmail_v1.Gmail> {
    if (!this.client) {
      const auth = await this.authorize();
      this.client = google.gmail({ version: 'v1', auth });
    }
    return this.client;
  }

  private async call<T>(operation: string, request: (gmail: gmail_v1.Gmail) => Promise<T>): Promise<T> {
    const gmail = await this.gmail();
    try {
      return await request(gmail);
    } catch (error) {
      this.logger.error(`Gmail ${operation} failed`, { error });
      throw new MailGatewayError(`Gmail ${operation} failed: ${errorMessage(error)}`, { operation });
    }
  }

  async listMessages(options: ListMessagesOptions): Promise<MessageRef[]> {
    const response = await this.call('list messages', (gmail) =>
      gmail.users.messages.list({
        userId: 'me',
        q: options.query,
        labelIds: options.labelIds,
        maxResults: options.maxResults,
      })
    );

    const refs = (response.data.messages ?? []).flatMap((m) =>
      m.id ? [{ id: m.id, threadId: m.threadId ?? '' }] : []
    );
    this.logger.debug('Listed messages', { count: refs.length, query: options.query, labelIds: options.labelIds });
    return refs;
  }

  async getMessage(id: string, projection: MessageProjection): Promise<GatewayMessage> {
    const response = await this.call('get message', (gmail) =>
      gmail.users.messages.get({
        userId: 'me',
        id,
        format: projection.format,
        metadataHeaders: projection.format === 'metadata' ? projection.headers : undefined,
      })
    );

    const msg = response.data;
    return {
      id: msg.id ?? id,
      threadId: msg.threadId ?? '',
      snippet: msg.snippet ?? '',
      headers: toHeaders(msg.payload?.headers),
      payload: msg.payload ?? null,
    };
  }

  async createDraft(request: DraftRequest): Promise<CreatedDraft> {
    const response = await this.call('create draft', (gmail) =>
      gmail.users.drafts.create({
        userId: 'me',
        requestBody: {
          message: { raw: request.raw, threadId: request.threadId },
        },
      })
    );

    const draft: CreatedDraft = {
      draftId: response.data.id ?? '',
      messageId: response.data.message?.id ?? '',
      threadId: response.data.message?.threadId ?? request.threadId ?? '',
    };
    this.logger.info('Created draft', { id: draft.draftId, threadId: draft.threadId });
    return draft;
  }
}
