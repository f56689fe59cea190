import { getToolErrorMessage, logToolError } from './tool-error.js';

export type TextPayload = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

/** Build an MCP tool success payload with JSON-stringified content. */
export function jsonResponse(payload: unknown): TextPayload {
  return {
    content: [
      {
        type: 'text',
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/** Build an MCP tool error payload with JSON-stringified content and isError: true. */
export function jsonErrorResponse(payload: unknown): TextPayload {
  return {
    ...jsonResponse(payload),
    isError: true,
  };
}

/**
 * Run a tool body and wrap its result. Failures are logged and returned as
 * `{ status: 'error', message }` with isError set.
 */
export async function runTool(
  toolName: string,
  fallbackMessage: string,
  fn: () => Promise<unknown>
): Promise<TextPayload> {
  try {
    return jsonResponse(await fn());
  } catch (error) {
    logToolError(toolName, error);
    return jsonErrorResponse({
      status: 'error',
      message: getToolErrorMessage(error, fallbackMessage),
    });
  }
}
