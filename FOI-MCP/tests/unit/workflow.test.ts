import { describe, it, expect, vi } from "vitest";
import { FakeMailGateway, makeMessage, rawHeaderLines } from "@foi-mailroom/shared/Testing/index.js";
import { KnowledgeSourceError, MailGatewayError, ValidationError } from "@foi-mailroom/shared/Types/errors.js";
import type { KnowledgeSource } from "../../src/knowledge/loader.js";
import { acknowledgementBody } from "../../src/triage/acknowledgement.js";
import { FoiTriageWorkflow, INTERNAL_DRAFT_CREATED } from "../../src/triage/workflow.js";
import type { GatewayMessage } from "@foi-mailroom/shared/Gmail/gateway.js";

function knowledge(): KnowledgeSource {
  return {
    loadLibrary: vi.fn(async () => [
      { identifier: "FOI-1", title: "Permits", text: "Counts", link: "https://example.org/1" },
    ]),
    loadTeamDirectory: vi.fn(async () => new Map([["Records", "records@example.org"]])),
  };
}

function sequence(...refs: string[]): () => string {
  let i = 0;
  return () => refs[i++ % refs.length];
}

function workflowFor(messages: GatewayMessage[], overrides: { maxUnread?: number } = {}) {
  const gateway = new FakeMailGateway(messages);
  const source = knowledge();
  const workflow = new FoiTriageWorkflow({
    gateway,
    knowledge: source,
    nextReference: sequence("CAM1234", "CAM5678"),
    ...overrides,
  });
  return { gateway, source, workflow };
}

const foiRequest = makeMessage({
  id: "m1",
  threadId: "T1",
  from: "a@x.com",
  subject: "FOI Request",
  body: "Please send records",
});

describe("FoiTriageWorkflow.processUnread", () => {
  it("acknowledges a single FOI request and returns one prompt", async () => {
    const { gateway, workflow } = workflowFor([foiRequest]);

    const result = await workflow.processUnread();

    const drafts = gateway.decodedDrafts();
    expect(drafts).toHaveLength(1);
    expect(drafts[0].threadId).toBe("T1");
    expect(drafts[0].headers.To).toBe("a@x.com");
    expect(drafts[0].headers.Subject).toBe("Freedom of Information request – CAM1234");
    expect(drafts[0].body).toBe(acknowledgementBody("CAM1234"));

    expect(result.prompts).toHaveLength(1);
    expect(result.prompts[0]).toContain("CAM1234");
    expect(result.prompts[0]).toContain("- Thread ID: T1");
    expect(result.prompts[0]).toContain("Subject:\nFOI Request\n\nRequest body:\nPlease send records\n");
    expect(result.prompts[0]).toContain("- Records (records@example.org)");
    expect(result.processed).toEqual([
      {
        messageId: "m1",
        threadId: "T1",
        sender: "a@x.com",
        subject: "FOI Request",
        reference: "CAM1234",
        acknowledgementDraftId: "draft-1",
      },
    ]);
    expect(result.skipped).toEqual([]);
  });

  it("addresses the acknowledgement to a sender with a non-ASCII name", async () => {
    const { gateway, workflow } = workflowFor([
      makeMessage({ id: "m4", threadId: "T4", from: "José Pérez <jose@x.com>", subject: "FOI: bin collections", body: "" }),
    ]);

    await workflow.processUnread();

    const encodedName = Buffer.from("José Pérez", "utf-8").toString("base64");
    expect(rawHeaderLines(gateway.drafts[0])[0]).toBe(`To: =?UTF-8?B?${encodedName}?= <jose@x.com>`);
    expect(gateway.decodedDrafts()[0].headers.To).toBe("José Pérez <jose@x.com>");
  });

  it("lists unread messages by label with the configured bound", async () => {
    const { gateway, workflow } = workflowFor([foiRequest]);

    await workflow.processUnread();

    expect(gateway.listCalls).toEqual([{ labelIds: ["UNREAD"], maxResults: 3 }]);
    expect(gateway.getCalls).toEqual([{ id: "m1", projection: { format: "full" } }]);
  });

  it("skips messages without the keyword and creates nothing for them", async () => {
    const { gateway, workflow } = workflowFor([
      makeMessage({ id: "m9", threadId: "T9", from: "b@x.com", subject: "Lunch?", body: "Are you free" }),
    ]);

    const result = await workflow.processUnread();

    expect(result).toEqual({ prompts: [], processed: [], skipped: ["m9"] });
    expect(gateway.drafts).toEqual([]);
  });

  it("classifies on the plain text body", async () => {
    const { workflow } = workflowFor([
      makeMessage({ id: "m2", threadId: "T2", from: "c@x.com", subject: "Request", body: "This is an foi request" }),
    ]);

    const result = await workflow.processUnread();

    expect(result.processed.map((p) => p.messageId)).toEqual(["m2"]);
  });

  it("handles FOI and other mail in mailbox order with fresh references", async () => {
    const { gateway, workflow } = workflowFor([
      foiRequest,
      makeMessage({ id: "m2", threadId: "T2", from: "b@x.com", subject: "Newsletter", body: "Hello" }),
      makeMessage({ id: "m3", threadId: "T3", from: "c@x.com", subject: "Another FOI", body: "Data please" }),
    ]);

    const result = await workflow.processUnread();

    expect(result.processed.map((p) => [p.messageId, p.reference])).toEqual([
      ["m1", "CAM1234"],
      ["m3", "CAM5678"],
    ]);
    expect(result.skipped).toEqual(["m2"]);
    expect(gateway.drafts.map((d) => d.threadId)).toEqual(["T1", "T3"]);
  });

  it("examines at most maxUnread messages", async () => {
    const messages = ["a", "b", "c", "d"].map((id) =>
      makeMessage({ id, threadId: `T-${id}`, from: `${id}@x.com`, subject: "FOI", body: "" })
    );
    const { gateway, workflow } = workflowFor(messages, { maxUnread: 2 });

    const result = await workflow.processUnread();

    expect(result.prompts).toHaveLength(2);
    expect(gateway.listCalls[0].maxResults).toBe(2);
  });

  it("loads knowledge before touching the mailbox, on every call", async () => {
    const { source, workflow } = workflowFor([]);

    await workflow.processUnread();
    await workflow.processUnread();

    expect(source.loadLibrary).toHaveBeenCalledTimes(2);
    expect(source.loadTeamDirectory).toHaveBeenCalledTimes(2);
  });

  it("propagates knowledge errors without listing mail", async () => {
    const gateway = new FakeMailGateway([foiRequest]);
    const workflow = new FoiTriageWorkflow({
      gateway,
      knowledge: {
        loadLibrary: async () => {
          throw new KnowledgeSourceError("library.csv is missing required columns: Document Link");
        },
        loadTeamDirectory: async () => new Map(),
      },
    });

    await expect(workflow.processUnread()).rejects.toThrow("library.csv is missing required columns: Document Link");
    expect(gateway.listCalls).toEqual([]);
  });

  it("propagates draft failures", async () => {
    const { gateway, workflow } = workflowFor([foiRequest]);
    gateway.failOn("createDraft", "Gmail create draft failed: quota exceeded");

    await expect(workflow.processUnread()).rejects.toBeInstanceOf(MailGatewayError);
  });

  it("keeps drafts created before a failure", async () => {
    const { gateway, workflow } = workflowFor([
      foiRequest,
      makeMessage({ id: "m2", threadId: "T2", from: "b@x.com", subject: "FOI too", body: "" }),
    ]);
    gateway.failGetFor("m2");

    await expect(workflow.processUnread()).rejects.toThrow("Requested entity was not found: m2");
    expect(gateway.drafts.map((d) => d.threadId)).toEqual(["T1"]);
  });

  it("rejects a malformed reference before drafting anything", async () => {
    const gateway = new FakeMailGateway([foiRequest]);
    const workflow = new FoiTriageWorkflow({
      gateway,
      knowledge: knowledge(),
      nextReference: () => "REF-1",
    });

    const run = workflow.processUnread();

    await expect(run).rejects.toBeInstanceOf(ValidationError);
    await expect(run).rejects.toThrow("Invalid case reference: REF-1");
    expect(gateway.drafts).toEqual([]);
  });

  it("uses an injected classifier", async () => {
    const gateway = new FakeMailGateway([
      makeMessage({ id: "m5", threadId: "T5", from: "e@x.com", subject: "Records request", body: "" }),
    ]);
    const workflow = new FoiTriageWorkflow({
      gateway,
      knowledge: knowledge(),
      classifier: (subject) => subject.startsWith("Records"),
      nextReference: () => "CAM2000",
    });

    const result = await workflow.processUnread();

    expect(result.processed.map((p) => p.reference)).toEqual(["CAM2000"]);
  });
});

describe("FoiTriageWorkflow.composeInternalDraft", () => {
  it("creates one draft in the given thread", async () => {
    const { gateway, workflow } = workflowFor([]);

    const message = await workflow.composeInternalDraft({
      to: "records@example.org",
      subject: "Allocation: CAM1234",
      body: "Please handle FOI CAM1234.",
      thread_id: "T1",
    });

    expect(message).toBe(INTERNAL_DRAFT_CREATED);
    const [draft] = gateway.decodedDrafts();
    expect(gateway.drafts).toHaveLength(1);
    expect(draft.threadId).toBe("T1");
    expect(draft.headers.To).toBe("records@example.org");
    expect(draft.headers.Subject).toBe("Allocation: CAM1234");
    expect(draft.body).toBe("Please handle FOI CAM1234.");
  });

  it("threads the acknowledgement and the allocation together", async () => {
    const { gateway, workflow } = workflowFor([foiRequest]);

    const { processed } = await workflow.processUnread();
    await workflow.composeInternalDraft({
      to: "records@example.org",
      subject: `Allocation: ${processed[0].reference}`,
      body: "Over to you",
      thread_id: processed[0].threadId,
    });

    expect(gateway.drafts.map((d) => d.threadId)).toEqual(["T1", "T1"]);
  });

  it("propagates gateway failures", async () => {
    const { gateway, workflow } = workflowFor([]);
    gateway.failOn("createDraft", "Invalid To header");

    await expect(
      workflow.composeInternalDraft({ to: "not-an-address", subject: "s", body: "b", thread_id: "T1" })
    ).rejects.toThrow("Invalid To header");
  });
});
