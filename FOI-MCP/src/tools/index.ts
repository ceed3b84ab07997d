import { toolEntry, type ToolMapEntry } from "@foi-mailroom/shared/Types/tools.js";
import type { FoiTriageWorkflow } from "../triage/workflow.js";
import {
  processUnreadFoiTool,
  ProcessUnreadFoiInputSchema,
  handleProcessUnreadFoi,
  composeInternalDraftTool,
  ComposeInternalDraftInputSchema,
  handleComposeInternalDraft,
} from "./triage.js";

export * from "./triage.js";

/**
 * Tools reachable through the HTTP /tools/call endpoint
 */
export function createToolMap(workflow: FoiTriageWorkflow): Record<string, ToolMapEntry> {
  return {
    [processUnreadFoiTool.name]: toolEntry(
      processUnreadFoiTool.description,
      ProcessUnreadFoiInputSchema,
      () => handleProcessUnreadFoi(workflow)
    ),
    [composeInternalDraftTool.name]: toolEntry(
      composeInternalDraftTool.description,
      ComposeInternalDraftInputSchema,
      (input) => handleComposeInternalDraft(workflow, input)
    ),
  };
}
