import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { StageError } from "../result.js";

/**
 * Machine-readable error codes for tool responses.
 *
 * Keep this list stable once clients depend on it.
 */
export type JrdToolErrorCode =
  | "INVALID_ARGUMENT"
  | "NOT_FOUND"
  | "UNAUTHORIZED"
  | "UNAVAILABLE"
  | "INTERNAL";

/**
 * Standard machine-readable error envelope for all tools.
 */
export interface JrdToolError {
  /** Stable error code for programmatic branching. */
  code: JrdToolErrorCode;
  /** Human-readable message (safe for operator display). */
  message: string;
  /** Tool name that produced the error. */
  tool: string;
  /** Whether retrying the exact same request may succeed. */
  retryable?: boolean;
  details?: Record<string, unknown>;
  /** Suggestion for the operator on how to resolve this error. */
  suggestion?: string;
}

export interface JrdToolOk<T> extends Record<string, unknown> {
  ok: true;
  data: T;
}

export interface JrdToolFail extends Record<string, unknown> {
  ok: false;
  error: JrdToolError;
}

/**
 * Build a successful tool response with both `structuredContent` and a JSON
 * `content[].text` fallback for clients that only read text.
 */
export function toolOk<T extends Record<string, unknown>>(data: T): CallToolResult {
  const structuredContent: JrdToolOk<T> = { ok: true, data };
  return {
    structuredContent,
    content: [{ type: "text", text: JSON.stringify(structuredContent, null, 2) }],
  };
}

/**
 * Build an error tool response. `isError=true` makes MCP clients treat it as a
 * tool failure.
 */
export function toolErr(error: JrdToolError): CallToolResult {
  const structuredContent: JrdToolFail = { ok: false, error };
  return {
    isError: true,
    structuredContent,
    content: [{ type: "text", text: JSON.stringify(structuredContent, null, 2) }],
  };
}

/**
 * Map a pipeline {@link StageError} to a tool error.
 */
export function stageToolError(tool: string, error: StageError): JrdToolError {
  const status = error.details?.status;
  const transport = error.details?.transport;

  switch (error.kind) {
    case "input":
      return {
        code: "INVALID_ARGUMENT",
        tool,
        message: error.message,
        retryable: false,
        details: error.details,
      };
    case "credentials":
      return {
        code: "UNAUTHORIZED",
        tool,
        message: error.message,
        retryable: false,
        details: error.details,
        suggestion: "Set JRD_API_USERNAME and JRD_API_PASSWORD in the server environment",
      };
    case "config":
    case "hardware":
      return {
        code: "UNAVAILABLE",
        tool,
        message: error.message,
        retryable: false,
        details: error.details,
        suggestion:
          error.kind === "config"
            ? "Set serverUrl in config.json or JRD_SERVER_URL"
            : "Pass serial_number explicitly when not running on the managed Mac",
      };
    case "lookup":
    case "command":
      if (status === 401 || status === 403) {
        return {
          code: "UNAUTHORIZED",
          tool,
          message: error.message,
          retryable: false,
          details: error.details,
          suggestion: "Check the API account's credentials and its Computers / Send Computer Remote Desktop privileges",
        };
      }
      if (status === 404 || (error.kind === "lookup" && status === undefined && transport === undefined)) {
        return {
          code: "NOT_FOUND",
          tool,
          message: error.message,
          retryable: false,
          details: error.details,
          suggestion: "Verify the serial number is enrolled in Jamf Pro",
        };
      }
      if (transport === "network") {
        return { code: "UNAVAILABLE", tool, message: error.message, retryable: true, details: error.details };
      }
      return { code: "INTERNAL", tool, message: error.message, retryable: false, details: error.details };
  }
}
