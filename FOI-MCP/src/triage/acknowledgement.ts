import type { CaseReference } from "../types/foi.js";

export interface AcknowledgementOptions {
  organisation: string;
  /** Team name signed under the letter */
  signature: string;
  /** Statutory response period in working days */
  responseDays: number;
}

export const DEFAULT_ACKNOWLEDGEMENT: AcknowledgementOptions = {
  organisation: "London Borough of Camden",
  signature: "Information Rights Team",
  responseDays: 20,
};

export function acknowledgementSubject(reference: CaseReference): string {
  return `Freedom of Information request – ${reference}`;
}

export function acknowledgementBody(
  reference: CaseReference,
  options: AcknowledgementOptions = DEFAULT_ACKNOWLEDGEMENT
): string {
  return [
    "Dear Sir or Madam,",
    "",
    "Thank you for your request for information.",
    "",
    `Your request has been logged under the reference number ${reference}.`,
    "Please quote this reference in any future correspondence.",
    "",
    `We will respond within ${options.responseDays} working days in accordance with the`,
    "Freedom of Information Act 2000.",
    "",
    "Kind Regards,",
    "",
    options.signature,
    options.organisation,
    "",
  ].join("\n");
}
