/**
 * Protocol Constants
 *
 * Field widths, classification thresholds and action ids of the DFX
 * WebSocket sub-protocol. All of these are fixed by the server.
 */

// Outbound frame header: | action id (4B) | request id (10B) | body |
export const ACTION_ID_SIZE = 4;
export const REQUEST_ID_SIZE = 10;
export const OUTBOUND_HEADER_SIZE = ACTION_ID_SIZE + REQUEST_ID_SIZE;

// Inbound message header: | connection id (10B) | status (3B) | body |
export const CONNECTION_ID_SIZE = 10;
export const STATUS_CODE_SIZE = 3;
export const CHUNK_HEADER_SIZE = CONNECTION_ID_SIZE + STATUS_CODE_SIZE;

// Inbound classification by total length
export const SUBSCRIBE_STATUS_LENGTH = 13;
export const MAX_ADD_DATA_STATUS_LENGTH = 60;

// Action ids (4 ASCII digits)
export enum ActionId {
  ADD_DATA = "0506",
  SUBSCRIBE_RESULTS = "0510",
}

// Inbound message classes
export enum MessageClass {
  SUBSCRIBE_STATUS = "SUBSCRIBE_STATUS",
  ADD_DATA_STATUS = "ADD_DATA_STATUS",
  RESULT_CHUNK = "RESULT_CHUNK",
}

export const STATUS_OK = "200";
