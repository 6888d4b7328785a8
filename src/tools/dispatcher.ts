import { ZodError, type z } from 'zod';
import { StaError, errorMessage, invalidParams } from '../shared/index.js';
import type { ToolExposureMode, ToolHandlerContext } from './registry.js';
import { getToolSpec, isToolExposed } from './registry.js';

export type ToolCallResult = {
  content: { type: 'text'; text: string }[];
  isError?: boolean;
};

function parseToolArgs(toolName: string, schema: z.ZodType, args: unknown): unknown {
  try {
    return schema.parse(args);
  } catch (err) {
    if (err instanceof ZodError) {
      throw invalidParams(`Invalid parameters for ${toolName}`, {
        issues: err.issues,
      });
    }
    throw err;
  }
}

function formatToolError(err: unknown): ToolCallResult {
  const payload = err instanceof StaError
    ? {
      error: {
        code: err.code,
        message: err.message,
        retryable: err.retryable,
        ...(err.data !== undefined ? { data: err.data } : {}),
      },
    }
    : {
      error: {
        code: 'INTERNAL_ERROR',
        message: errorMessage(err),
      },
    };

  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    isError: true,
  };
}

export async function handleToolCall(
  name: string,
  args: Record<string, unknown>,
  mode: ToolExposureMode = 'standard',
  ctx: ToolHandlerContext = {},
): Promise<ToolCallResult> {
  try {
    const spec = getToolSpec(name);
    if (!spec) {
      throw invalidParams(`Unknown tool: ${name}`);
    }
    if (!isToolExposed(spec, mode)) {
      throw invalidParams(`Tool not exposed in ${mode} mode: ${name}`);
    }

    const parsedArgs = parseToolArgs(name, spec.zodSchema, args);
    const result = await spec.handler(parsedArgs, ctx);
    return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
  } catch (err) {
    return formatToolError(err);
  }
}
