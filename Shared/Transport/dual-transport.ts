/**
 * Transport layer for the mailroom MCP servers.
 * stdio by default; HTTP/SSE when TRANSPORT is 'sse' or 'http'.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { SSEServerTransport } from '@modelcontextprotocol/sdk/server/sse.js';
import { createServer as createHttpServer, type Server as HttpServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { ToolMapEntry } from '../Types/tools.js';
import { createErrorFromException } from '../Types/StandardResponse.js';

export const TOKEN_HEADER = 'x-mcp-token';

interface MCPServer {
  connect(transport: Transport): Promise<void>;
}

export type TransportKind = 'stdio' | 'sse' | 'http';

export interface TransportConfig {
  transport: TransportKind;
  /** Port for HTTP/SSE; 0 lets the OS pick */
  port: number;
  serverName: string;
  /** When set, every route except /health requires the X-MCP-Token header */
  token?: string;
  onHealth?: () => Record<string, unknown>;
  /** Tools reachable through GET /tools/list and POST /tools/call */
  tools?: Record<string, ToolMapEntry>;
  onShutdown?: () => void | Promise<void>;
  log?: (message: string, data?: unknown) => void;
}

export interface TransportResult {
  /** null for stdio */
  httpServer: HttpServer | null;
  shutdown: () => Promise<void>;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let body = '';
    req.on('data', (chunk: Buffer) => {
      body += chunk.toString();
    });
    req.on('end', () => resolve(body));
    req.on('error', reject);
  });
}

function parseToolCall(body: string): { name: string; args: unknown } {
  const parsed: unknown = JSON.parse(body);
  if (typeof parsed !== 'object' || parsed === null || !('name' in parsed) || typeof parsed.name !== 'string') {
    throw new Error('Request body must be {"name": string, "arguments"?: object}');
  }
  return { name: parsed.name, args: 'arguments' in parsed ? parsed.arguments : {} };
}

export async function startTransport(
  server: MCPServer,
  config: TransportConfig
): Promise<TransportResult> {
  const log = config.log ?? ((msg: string, data?: unknown) => {
    const suffix = data === undefined ? '' : ` ${JSON.stringify(data)}`;
    console.error(`[${new Date().toISOString()}] [INFO] [${config.serverName}] ${msg}${suffix}`);
  });

  const shutdownHooks = async (): Promise<void> => {
    if (config.onShutdown) {
      await config.onShutdown();
    }
  };

  if (config.transport === 'stdio') {
    const transport = new StdioServerTransport();
    await server.connect(transport);
    log('Running on stdio transport');
    return { httpServer: null, shutdown: shutdownHooks };
  }

  const tools = config.tools ?? {};
  const toolDefinitions = Object.entries(tools).map(([name, entry]) => ({
    name,
    description: entry.description,
    inputSchema: zodToJsonSchema(entry.schema),
  }));

  // Open SSE streams by session id; POST /message?sessionId=... is routed here
  const sessions = new Map<string, SSEServerTransport>();

  const httpServer = createHttpServer(async (req: IncomingMessage, res: ServerResponse) => {
    const origin = req.headers.origin;
    if (origin && /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/.test(origin)) {
      res.setHeader('Access-Control-Allow-Origin', origin);
    }
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-MCP-Token');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', 'http://127.0.0.1');
    const path = url.pathname;

    if (path === '/health' && req.method === 'GET') {
      sendJson(res, 200, { status: 'ok', server: config.serverName, ...(config.onHealth?.() ?? {}) });
      return;
    }

    if (config.token && req.headers[TOKEN_HEADER] !== config.token) {
      sendJson(res, 401, { error: 'Unauthorized' });
      return;
    }

    if (path === '/sse' && req.method === 'GET') {
      const transport = new SSEServerTransport('/message', res);
      const { sessionId } = transport;
      sessions.set(sessionId, transport);
      transport.onclose = () => {
        sessions.delete(sessionId);
        log('SSE connection closed', { sessionId });
      };
      await server.connect(transport);
      log('SSE connection established', { sessionId });
      return;
    }

    if (path === '/message' && req.method === 'POST') {
      const sessionId = url.searchParams.get('sessionId');
      if (!sessionId) {
        sendJson(res, 400, { error: 'Missing sessionId' });
        return;
      }
      const transport = sessions.get(sessionId);
      if (!transport) {
        sendJson(res, 404, { error: `Unknown session: ${sessionId}` });
        return;
      }
      await transport.handlePostMessage(req, res);
      return;
    }

    if (path === '/tools/list' && req.method === 'GET') {
      sendJson(res, 200, { tools: toolDefinitions });
      return;
    }

    if (path === '/tools/call' && req.method === 'POST') {
      try {
        const { name, args } = parseToolCall(await readBody(req));
        const entry = tools[name];
        if (!entry) {
          sendJson(res, 404, { error: `Unknown tool: ${name}` });
          return;
        }
        const result = await entry.call(args);
        sendJson(res, 200, { content: [{ type: 'text', text: JSON.stringify(result) }] });
      } catch (error) {
        sendJson(res, 500, {
          content: [{ type: 'text', text: JSON.stringify(createErrorFromException(error)) }],
          isError: true,
        });
      }
      return;
    }

    res.writeHead(404);
    res.end('Not found');
  });

  const shutdown = async (): Promise<void> => {
    log('Shutting down...');
    await shutdownHooks();
    await Promise.all([...sessions.values()].map((transport) => transport.close()));
    await new Promise<void>((resolveClose) => {
      httpServer.close(() => {
        log('Server closed');
        resolveClose();
      });
    });
  };

  await new Promise<void>((resolveListen, rejectListen) => {
    httpServer.once('error', rejectListen);
    httpServer.listen(config.port, '127.0.0.1', () => {
      httpServer.off('error', rejectListen);
      resolveListen();
    });
  });

  const address = httpServer.address();
  const port = typeof address === 'object' && address ? address.port : config.port;
  log(`Running on http://localhost:${port}`, {
    endpoints: ['GET /health', 'GET /sse', 'POST /message', 'GET /tools/list', 'POST /tools/call'],
    tools: toolDefinitions.length,
  });

  return { httpServer, shutdown };
}

/**
 * Exit cleanly on SIGINT/SIGTERM after running the transport's shutdown.
 */
export function exitOnSignals(result: TransportResult, onError: (error: unknown) => void): void {
  const stop = (): void => {
    result.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        onError(error);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);
}
