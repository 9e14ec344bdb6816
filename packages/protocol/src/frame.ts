/**
 * Frame Encoding and Decoding
 *
 * Outbound:
 * | action id (4B) | request id (10B) | body (variable) |
 *
 * Inbound:
 * | connection id (10B) | remainder (variable) |
 *
 * Header fields are ASCII. Inbound messages carry no type field; their kind
 * is derived from the total length alone.
 */

import { randomUUID } from "crypto";
import {
  ACTION_ID_SIZE,
  REQUEST_ID_SIZE,
  OUTBOUND_HEADER_SIZE,
  CONNECTION_ID_SIZE,
  STATUS_CODE_SIZE,
  CHUNK_HEADER_SIZE,
  SUBSCRIBE_STATUS_LENGTH,
  MAX_ADD_DATA_STATUS_LENGTH,
  MessageClass,
} from "./constants.js";
import type { Frame, EncodedFrame } from "./types.js";
import { InvalidFrameError } from "./errors.js";

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;
const STATUS_DIGITS = /^\d{3}$/;

/**
 * Fit a header field to an exact width: pad with spaces, or truncate
 */
function fixedWidth(field: string, width: number, name: string): string {
  if (!PRINTABLE_ASCII.test(field)) {
    throw new InvalidFrameError(`${name} must be printable ASCII: ${JSON.stringify(field)}`);
  }
  return field.padEnd(width, " ").slice(0, width);
}

/**
 * Encode a frame for transmission
 *
 * @param actionId - Endpoint action id, e.g. "0506"
 * @param requestId - 10-character request id
 * @param body - Serialized request body
 */
export function encodeFrame(
  actionId: string,
  requestId: string,
  body: Uint8Array
): EncodedFrame {
  const header =
    fixedWidth(actionId, ACTION_ID_SIZE, "Action id") +
    fixedWidth(requestId, REQUEST_ID_SIZE, "Request id");

  const buffer = Buffer.alloc(OUTBOUND_HEADER_SIZE + body.length);
  buffer.write(header, 0, "latin1");
  buffer.set(body, OUTBOUND_HEADER_SIZE);

  return { buffer };
}

/**
 * Split an outbound frame back into its fields
 */
export function splitFrame(frameBuffer: Buffer): Frame {
  if (frameBuffer.length < OUTBOUND_HEADER_SIZE) {
    throw new InvalidFrameError(
      `Frame too short: expected at least ${OUTBOUND_HEADER_SIZE} bytes, got ${frameBuffer.length}`
    );
  }

  return {
    actionId: frameBuffer.toString("latin1", 0, ACTION_ID_SIZE),
    requestId: frameBuffer.toString("latin1", ACTION_ID_SIZE, OUTBOUND_HEADER_SIZE),
    body: frameBuffer.subarray(OUTBOUND_HEADER_SIZE),
  };
}

/**
 * Classify an inbound message by its length
 *
 * 13 bytes is a subscribe status, up to 60 an addData status, anything
 * longer a result chunk.
 */
export function classifyMessage(message: Uint8Array): MessageClass {
  if (message.length === SUBSCRIBE_STATUS_LENGTH) {
    return MessageClass.SUBSCRIBE_STATUS;
  }
  if (message.length <= MAX_ADD_DATA_STATUS_LENGTH) {
    return MessageClass.ADD_DATA_STATUS;
  }
  return MessageClass.RESULT_CHUNK;
}

/**
 * Random 10-hex-character request id
 */
export function generateRequestId(): string {
  return randomUUID().replace(/-/g, "").slice(0, REQUEST_ID_SIZE);
}

/**
 * Sender / connection id of an inbound message
 */
export function readConnectionId(message: Buffer): string {
  return message.toString("latin1", 0, Math.min(CONNECTION_ID_SIZE, message.length));
}

/**
 * The raw status field (bytes 10-13), unchecked
 */
export function readStatusField(message: Buffer): string {
  return message.toString("latin1", CONNECTION_ID_SIZE, CHUNK_HEADER_SIZE);
}

/**
 * Three-digit status of an addData or subscribe status message
 */
export function readStatusCode(message: Buffer): string {
  const status = readStatusField(message);
  if (message.length < CHUNK_HEADER_SIZE || !STATUS_DIGITS.test(status)) {
    throw new InvalidFrameError(
      `Expected a ${STATUS_CODE_SIZE}-digit status at offset ${CONNECTION_ID_SIZE}, got ${JSON.stringify(status)}`
    );
  }
  return status;
}

/**
 * Everything after the connection id and status: the addData response body,
 * or the payload of a result chunk
 */
export function readBody(message: Buffer): Buffer {
  return message.subarray(CHUNK_HEADER_SIZE);
}
