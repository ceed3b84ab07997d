import { z } from "zod";
import { NO_FOI_MESSAGES, type FoiTriageWorkflow } from "../triage/workflow.js";

// ============ PROCESS UNREAD FOI ============

export const processUnreadFoiTool = {
  name: "process-unread-foi",
  description:
    "Create an external FOI acknowledgement draft for each unread FOI request and return a task asking you to allocate it to a team",
};

export const ProcessUnreadFoiInputSchema = z.object({});

export async function handleProcessUnreadFoi(workflow: FoiTriageWorkflow): Promise<string[]> {
  const { prompts } = await workflow.processUnread();
  return prompts.length > 0 ? prompts : [NO_FOI_MESSAGES];
}

// ============ COMPOSE INTERNAL DRAFT ============

export const composeInternalDraftTool = {
  name: "compose-internal-draft",
  description: "Create the internal FOI allocation email as a Gmail draft in the request's thread",
};

export const ComposeInternalDraftInputSchema = z.object({
  to: z.string().describe("Officer address of the team the request is allocated to"),
  subject: z.string().describe("Subject of the internal allocation email"),
  body: z.string().describe("Plain text body of the internal allocation email"),
  thread_id: z.string().describe("Thread ID given in the allocation task"),
});

export type ComposeInternalDraftInput = z.infer<typeof ComposeInternalDraftInputSchema>;

export async function handleComposeInternalDraft(
  workflow: FoiTriageWorkflow,
  input: ComposeInternalDraftInput
): Promise<string[]> {
  return [await workflow.composeInternalDraft(input)];
}
