/**
 * Unit tests for FOI MCP server registration and tool results.
 * Uses InMemoryTransport; no running server needed.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { FakeMailGateway, makeMessage } from '@foi-mailroom/shared/Testing/index.js';
import { createServer } from '../../src/server.js';
import { createToolMap } from '../../src/tools/index.js';
import { FoiTriageWorkflow } from '../../src/triage/workflow.js';

const EXPECTED_TOOLS = ['compose-internal-draft', 'process-unread-foi'];

describe('FOI MCP Server', () => {
  let client: Client;
  let gateway: FakeMailGateway;
  let workflow: FoiTriageWorkflow;

  async function call(name: string, args: Record<string, unknown>) {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    return {
      isError: result.isError ?? false,
      texts: result.content.flatMap((c) => (c.type === 'text' ? [c.text] : [])),
    };
  }

  beforeEach(async () => {
    gateway = new FakeMailGateway();
    workflow = new FoiTriageWorkflow({
      gateway,
      knowledge: {
        loadLibrary: async () => [],
        loadTeamDirectory: async () => new Map([['Records', 'records@example.org']]),
      },
      nextReference: () => 'CAM4321',
    });
    const server = createServer(workflow);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);

    client = new Client({ name: 'test-client', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
  });

  it('should register both tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual(EXPECTED_TOOLS);
  });

  it('should require every compose-internal-draft field', async () => {
    const { tools } = await client.listTools();
    const compose = tools.find((t) => t.name === 'compose-internal-draft');
    expect(compose?.inputSchema.required).toEqual(['to', 'subject', 'body', 'thread_id']);
  });

  it('should report when there is no FOI mail', async () => {
    gateway.setMessages([makeMessage({ id: 'm1', threadId: 'T1', from: 'a@x.com', subject: 'Hi', body: 'Hello' })]);

    expect(await call('process-unread-foi', {})).toEqual({
      isError: false,
      texts: ['No unread FOI emails found.'],
    });
  });

  it('should return one prompt per FOI request', async () => {
    gateway.setMessages([
      makeMessage({ id: 'm1', threadId: 'T1', from: 'a@x.com', subject: 'FOI Request', body: 'Please send records' }),
    ]);

    const { isError, texts } = await call('process-unread-foi', {});

    expect(isError).toBe(false);
    expect(texts).toHaveLength(1);
    expect(texts[0]).toContain('- Thread ID: T1\n- Reference: CAM4321\n');
    expect(gateway.drafts).toHaveLength(1);
  });

  it('should report gateway failures as a failed invocation', async () => {
    gateway.failOn('list', 'Gmail list messages failed: token revoked');

    expect(await call('process-unread-foi', {})).toEqual({
      isError: true,
      texts: ['Gmail list messages failed: token revoked'],
    });
  });

  it('should create the internal draft', async () => {
    const result = await call('compose-internal-draft', {
      to: 'records@example.org',
      subject: 'Allocation CAM4321',
      body: 'Please handle.',
      thread_id: 'T1',
    });

    expect(result).toEqual({ isError: false, texts: ['Internal draft created.'] });
    expect(gateway.drafts[0].threadId).toBe('T1');
  });
});

describe('createToolMap', () => {
  it('should expose both tools for direct calls', async () => {
    const gateway = new FakeMailGateway();
    const workflow = new FoiTriageWorkflow({
      gateway,
      knowledge: { loadLibrary: async () => [], loadTeamDirectory: async () => new Map() },
    });
    const tools = createToolMap(workflow);

    expect(Object.keys(tools).sort()).toEqual(EXPECTED_TOOLS);
    expect(await tools['process-unread-foi'].call(undefined)).toEqual(['No unread FOI emails found.']);
    await expect(tools['compose-internal-draft'].call({ to: 'x@example.org' })).rejects.toThrow('Invalid parameters');
  });
});
