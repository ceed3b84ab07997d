/**
 * Decides whether an unread message is an FOI request
 */
export type Classifier = (subject: string, body: string) => boolean;

const FOI_KEYWORD = "foi";

/**
 * Case-insensitive "foi" anywhere in the subject or body
 */
export const containsFoiKeyword: Classifier = (subject, body) =>
  subject.toLowerCase().includes(FOI_KEYWORD) || body.toLowerCase().includes(FOI_KEYWORD);
