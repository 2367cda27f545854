import { z } from "zod/v4";

/**
 * Shared Zod schemas for tool inputs and outputs.
 *
 * Output models are `passthrough` so fields can be added without breaking
 * older clients.
 */

export const zNonEmptyString = z
  .string()
  .min(1, "Must be a non-empty string")
  .describe("A non-empty string.");

export const zSerialNumber = z
  .string()
  .trim()
  .min(1, "Must be a non-empty string")
  .describe(
  "Hardware serial number of the Mac (e.g. C02ABC123XYZ). Defaults to the serial of the machine running the server."
);

export const zEmptyDeviceIdPolicy = z
  .enum(["forward", "fail"])
  .describe(
    "What to do when Jamf returns no device id: `forward` sends the command anyway and lets Jamf reject it; `fail` stops before sending."
  );

export const zToolErrorCode = z
  .enum(["INVALID_ARGUMENT", "NOT_FOUND", "UNAUTHORIZED", "UNAVAILABLE", "INTERNAL"])
  .describe("Stable error code.");

export const zToolError = z
  .object({
    code: zToolErrorCode,
    message: z.string(),
    tool: z.string(),
    retryable: z.boolean().optional(),
    details: z.record(z.string(), z.unknown()).optional(),
    suggestion: z.string().optional(),
  })
  .passthrough();

/**
 * Wrap a success payload schema in the standard `{ ok, data, error }` envelope.
 */
export function zToolResult<T extends z.ZodType>(dataSchema: T) {
  return z
    .object({
      ok: z.boolean().describe("True on success; false on failure."),
      data: dataSchema.optional().describe("Success payload when ok=true."),
      error: zToolError.optional().describe("Error payload when ok=false."),
    })
    .passthrough()
    .describe("Standard tool result envelope.");
}

export const zOutAbout = zToolResult(
  z
    .object({
      schema_version: z.number().int().positive(),
      toolkit: z
        .object({
          name: zNonEmptyString,
          version: zNonEmptyString,
          log_level: zNonEmptyString,
          server_url_source: z.enum(["config", "preferences"]),
          empty_device_id: zEmptyDeviceIdPolicy,
        })
        .passthrough(),
      tools: z.record(z.string(), z.string()),
      workflow: z.array(z.string()),
      failure_modes: z.array(z.string()),
    })
    .passthrough()
);

export const zOutDevicesLookup = zToolResult(
  z
    .object({
      serial_number: zNonEmptyString,
      device_id: zNonEmptyString.describe("Jamf Pro internal computer id."),
    })
    .passthrough()
);

export const zOutRemoteDesktopEnable = zToolResult(
  z
    .object({
      serial_number: zNonEmptyString,
      device_id: z.string().describe("Device id the command was sent for (may be empty under `forward`)."),
      message: zNonEmptyString,
    })
    .passthrough()
);
