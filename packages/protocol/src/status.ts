/**
 * Application-level error codes
 *
 * REST responses and WebSocket addData acks both report failures as a
 * `{ "Code": "..." }` body. Everything that needs to react to a specific
 * failure goes through parseErrorCode.
 */

import { looseObject, safeParse, string } from "valibot";

export const ErrorCode = {
  MEASUREMENT_CLOSED: "MEASUREMENT_CLOSED",
  INVALID_USER: "INVALID_USER",
  INVALID_PASSWORD: "INVALID_PASSWORD",
  INVALID_TOKEN: "INVALID_TOKEN",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

const errorBodySchema = looseObject({ Code: string() });
const CODE_TOKEN = /^[A-Z][A-Z_]*$/;

/**
 * Extract the error code from a decoded JSON body, a JSON string or raw bytes
 */
export function parseErrorCode(body: unknown): string | undefined {
  if (Buffer.isBuffer(body) || body instanceof Uint8Array) {
    return parseErrorCode(Buffer.from(body).toString("utf8"));
  }

  if (typeof body === "string") {
    const text = body.trim();
    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch {
      // Plain-text body: accept a bare code token
      return CODE_TOKEN.test(text) ? text : undefined;
    }
    return parseErrorCode(decoded);
  }

  const result = safeParse(errorBodySchema, body);
  return result.success ? result.output.Code : undefined;
}

/**
 * True when the server closed the measurement this chunk was sent to
 */
export function isMeasurementClosed(status: number, code: string | undefined): boolean {
  return (status === 400 || status === 405) && code === ErrorCode.MEASUREMENT_CLOSED;
}
