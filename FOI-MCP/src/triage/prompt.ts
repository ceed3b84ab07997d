import { formatLibrary } from "../knowledge/loader.js";
import type { CaseReference, HistoricalResponseRecord, TeamDirectory } from "../types/foi.js";

export interface AllocationPromptInput {
  subject: string;
  body: string;
  library: readonly HistoricalResponseRecord[];
  teams: TeamDirectory;
  reference: CaseReference;
  threadId: string;
  organisation: string;
}

export const INTERNAL_DRAFT_TOOL = "compose-internal-draft";

export function formatTeams(teams: TeamDirectory): string {
  return [...teams].map(([team, address]) => `- ${team} (${address})`).join("\n");
}

/**
 * Instructions for the agent to allocate one FOI request and save the
 * internal email through compose-internal-draft.
 */
export function buildAllocationPrompt(input: AllocationPromptInput): string {
  return `You are an FOI officer at ${input.organisation}.

### New FOI request
Subject:
${input.subject}

Request body:
${input.body}

---

### Previous FOI responses
${formatLibrary(input.library)}

---

### Available teams
${formatTeams(input.teams)}

---

### Tasks
1. Select the TOP 5 most relevant previous FOIs.
2. Decide the single best team to handle this request.
3. Draft an INTERNAL allocation email to that team's address.
4. Call the tool \`${INTERNAL_DRAFT_TOOL}\` to save the draft in Gmail.

Use:
- Thread ID: ${input.threadId}
- Reference: ${input.reference}

---

### Output rules
You MUST call the tool.
Do NOT write the email in chat.
`;
}
