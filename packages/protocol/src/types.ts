/**
 * Protocol Type Definitions
 */

import { MessageClass } from "./constants.js";

/**
 * An outbound frame split back into its fields
 */
export type Frame = {
  actionId: string; // 4 characters, space padded
  requestId: string; // 10 characters, space padded
  body: Buffer; // Serialized request body
};

/**
 * Frame encoding result
 */
export type EncodedFrame = {
  buffer: Buffer; // Complete frame ready to send
};

/**
 * Raw inbound message with its length-derived class
 */
export type InboundMessage = {
  messageClass: MessageClass;
  connectionId: string; // First 10 bytes
  data: Buffer; // Whole message, header included
};

/**
 * Action flag attached to each uploaded chunk
 */
export type ChunkAction = "FIRST::PROCESS" | "CHUNK::PROCESS" | "LAST::PROCESS";

/**
 * One chunk of measurement data, as sent by addData
 */
export type DataRequest = {
  measurementId: string;
  chunkOrder: number;
  action: ChunkAction | string;
  startTime: number;
  endTime: number;
  duration: number;
  payload: Uint8Array;
  meta?: Record<string, unknown>;
};

/**
 * Result of one addData exchange, over either REST or WebSocket
 */
export type AckOutcome =
  | { kind: "success"; status: 200; body: Buffer }
  | { kind: "rejected"; status: number; code: string | undefined; body: Buffer }
  | { kind: "aborted" }
  | { kind: "timedOut" };
