import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { isPipelineError } from "../domain/errors.js";

export function toJsonResult(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/** Pipeline failures become tool errors; anything else is left to the SDK. */
export async function runTool(run: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    return toJsonResult(await run());
  } catch (error) {
    if (!isPipelineError(error)) {
      throw error;
    }
    return {
      ...toJsonResult({ error: { kind: error.kind, message: error.message } }),
      isError: true,
    };
  }
}
