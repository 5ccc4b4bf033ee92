import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { describeError } from "../domain/errors.js";

export function jsonResponse(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/** Failures are reported in-band so the client sees the error code and details. */
export function errorResponse(error: unknown): CallToolResult {
  return {
    isError: true,
    content: [
      {
        type: "text",
        text: JSON.stringify(describeError(error), null, 2),
      },
    ],
  };
}
