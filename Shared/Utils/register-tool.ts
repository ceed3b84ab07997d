/**
 * Tool registration wrappers for McpServer.
 *
 * Two conventions, matching the two error policies of the servers:
 * - registerTool: handler returns JSON data, thrown errors come back as a
 *   StandardResponse payload so the call itself never fails
 * - registerTextTool: handler returns text segments, thrown errors are logged
 *   and reported as a failed invocation (isError)
 */

import type { z } from 'zod';
import { createErrorFromException } from '../Types/StandardResponse.js';
import { errorMessage } from '../Types/errors.js';
import type { Logger } from './logger.js';

/**
 * Structural stand-in for McpServer, so packages do not need the concrete class.
 */
export interface McpServerLike {
  registerTool(...args: unknown[]): unknown;
}

export interface ToolAnnotations extends Record<string, unknown> {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolCallResult {
  content: TextContent[];
  isError?: boolean;
}

/**
 * Input schemas are zod objects: the SDK takes their `.shape`, the wrapper
 * parses with the full object so the handler receives the output type `O`.
 */
export type ToolInputSchema<S extends z.ZodRawShape, O> = z.ZodObject<S, z.UnknownKeysParam, z.ZodTypeAny, O>;

export interface ToolConfig<S extends z.ZodRawShape, O, R> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema<S, O>;
  annotations?: ToolAnnotations;
  logger?: Logger;
  handler: (input: O) => Promise<R>;
}

function register<S extends z.ZodRawShape, O, R>(
  server: McpServerLike,
  config: ToolConfig<S, O, R>,
  respond: (result: R) => ToolCallResult,
  fail: (error: unknown) => ToolCallResult
): void {
  server.registerTool(
    config.name,
    {
      description: config.description,
      inputSchema: config.inputSchema.shape,
      annotations: config.annotations,
    },
    async (args: unknown): Promise<ToolCallResult> => {
      config.logger?.info('Tool called', { name: config.name });
      // The SDK has already validated against the same shape; parsing again
      // gives the handler its typed input and applies schema defaults.
      const parsed = config.inputSchema.safeParse(args ?? {});
      if (!parsed.success) {
        return fail(parsed.error);
      }
      try {
        return respond(await config.handler(parsed.data));
      } catch (error) {
        config.logger?.error('Tool call failed', { name: config.name, error });
        return fail(error);
      }
    }
  );
}

/**
 * Register a tool whose result is JSON data.
 */
export function registerTool<S extends z.ZodRawShape, O>(
  server: McpServerLike,
  config: ToolConfig<S, O, unknown>
): void {
  register(
    server,
    config,
    (result) => ({ content: [{ type: 'text', text: JSON.stringify(result) }] }),
    (error) => ({ content: [{ type: 'text', text: JSON.stringify(createErrorFromException(error)) }] })
  );
}

/**
 * Register a tool whose result is a list of text segments.
 */
export function registerTextTool<S extends z.ZodRawShape, O>(
  server: McpServerLike,
  config: ToolConfig<S, O, string[]>
): void {
  register(
    server,
    config,
    (segments) => ({ content: segments.map((text) => ({ type: 'text', text })) }),
    (error) => ({ content: [{ type: 'text', text: errorMessage(error) }], isError: true })
  );
}
