/**
 * Tool dispatch types shared by the MCP servers' HTTP /tools/call endpoint
 */

import type { z } from 'zod';
import { ValidationError } from './errors.js';

/**
 * Type-erased dispatch entry: `call` validates input against `schema`
 * and hands the parsed value to the handler.
 */
export interface ToolMapEntry {
  description: string;
  schema: z.ZodType;
  call: (input: unknown) => Promise<unknown>;
}

/**
 * Create a ToolMapEntry. Parsing and the handler call share the generic scope,
 * so the parsed value reaches the handler with its own type.
 */
export function toolEntry<T>(
  description: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  handler: (input: T) => Promise<unknown>
): ToolMapEntry {
  return {
    description,
    schema,
    call(input: unknown): Promise<unknown> {
      const result = schema.safeParse(input ?? {});
      if (!result.success) {
        return Promise.reject(
          new ValidationError(`Invalid parameters: ${result.error.message}`, result.error.flatten())
        );
      }
      return handler(result.data);
    },
  };
}
