/**
 * Plain-text MIME messages for Gmail drafts, and body extraction from
 * fetched message payloads.
 */

/** The subset of a Gmail message part this package reads */
export interface MessagePart {
  mimeType?: string | null;
  body?: { data?: string | null } | null;
  parts?: MessagePart[] | null;
}

export interface MessageHeader {
  name: string;
  value: string;
}

export interface OutgoingMessage {
  /** Omitted from the headers when empty */
  to?: string;
  subject: string;
  body: string;
  inReplyTo?: string;
  references?: string;
}

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;

/** Longest base64 payload, in source bytes, that keeps a word within 75 characters */
const MAX_WORD_BYTES = 45;

const NAME_ADDR = /^(.*?)\s*<([^<>]*)>$/;

function encodedWords(text: string): string[] {
  const chunks: string[] = [];
  let chunk = '';
  for (const char of text) {
    if (chunk && Buffer.byteLength(chunk + char, 'utf-8') > MAX_WORD_BYTES) {
      chunks.push(chunk);
      chunk = '';
    }
    chunk += char;
  }
  if (chunk) chunks.push(chunk);
  return chunks.map((c) => `=?UTF-8?B?${Buffer.from(c, 'utf-8').toString('base64')}?=`);
}

function singleLine(value: string): string {
  return value.replace(/[\r\n]+/g, ' ');
}

/**
 * Unstructured header value: CR/LF removed, non-ASCII text as RFC 2047
 * encoded words of at most 75 characters, folded onto continuation lines.
 */
export function encodeHeaderValue(value: string): string {
  const line = singleLine(value);
  if (PRINTABLE_ASCII.test(line)) {
    return line;
  }
  return encodedWords(line).join('\r\n ');
}

/** Split an address list on commas outside quotes and angle brackets */
function splitAddresses(value: string): string[] {
  const addresses: string[] = [];
  let current = '';
  let quoted = false;
  let angled = false;
  for (const char of value) {
    if (char === '"') quoted = !quoted;
    else if (!quoted && char === '<') angled = true;
    else if (!quoted && char === '>') angled = false;

    if (char === ',' && !quoted && !angled) {
      addresses.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  addresses.push(current);
  return addresses.map((a) => a.trim()).filter((a) => a.length > 0);
}

function encodeMailbox(mailbox: string): string {
  const match = NAME_ADDR.exec(mailbox);
  if (!match) return mailbox;

  const name = match[1].trim().replace(/^"(.*)"$/, '$1').replace(/\\(.)/g, '$1');
  const address = match[2].trim();
  if (!name) return `<${address}>`;
  if (PRINTABLE_ASCII.test(name)) return mailbox;
  return `${encodedWords(name).join(' ')} <${address}>`;
}

/**
 * To header value: only display names are encoded,
 * the `<addr-spec>` of each mailbox stays as written.
 */
export function encodeAddressHeader(value: string): string {
  const line = singleLine(value);
  if (PRINTABLE_ASCII.test(line)) {
    return line;
  }
  return splitAddresses(line).map(encodeMailbox).join(', ');
}

export function buildMimeMessage(message: OutgoingMessage): string {
  const headers: string[] = [];

  if (message.to) {
    headers.push(`To: ${encodeAddressHeader(message.to)}`);
  }
  headers.push(`Subject: ${encodeHeaderValue(message.subject)}`);
  if (message.inReplyTo) {
    headers.push(`In-Reply-To: ${encodeHeaderValue(message.inReplyTo)}`);
  }
  if (message.references) {
    headers.push(`References: ${encodeHeaderValue(message.references)}`);
  }
  headers.push('MIME-Version: 1.0');
  headers.push('Content-Type: text/plain; charset=utf-8');
  headers.push('Content-Transfer-Encoding: 8bit');

  const body = message.body.replace(/\r?\n/g, '\r\n');
  return [...headers, '', body].join('\r\n');
}

/**
 * The `raw` field Gmail expects: the whole message, base64url-encoded
 */
export function buildRawMessage(message: OutgoingMessage): string {
  return Buffer.from(buildMimeMessage(message), 'utf-8').toString('base64url');
}

export function decodeBase64Url(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

/**
 * First text/plain body in the payload: the payload itself when it is
 * single-part, otherwise the parts depth-first. Empty when there is none.
 */
export function extractPlainText(payload: MessagePart | null | undefined): string {
  if (!payload) return '';

  if (payload.mimeType === 'text/plain' && payload.body?.data) {
    return decodeBase64Url(payload.body.data);
  }

  for (const part of payload.parts ?? []) {
    const text = extractPlainText(part);
    if (text) return text;
  }
  return '';
}

/**
 * Header lookup, case-insensitive on the name; first occurrence wins
 */
export function getHeader(headers: readonly MessageHeader[], name: string): string | undefined {
  const wanted = name.toLowerCase();
  return headers.find((h) => h.name.toLowerCase() === wanted)?.value;
}
