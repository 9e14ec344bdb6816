/**
 * Client configuration
 */

export const config = {
  debug: process.env.DFX_DEBUG === "1",
  ackTimeoutMs: parseInt(process.env.DFX_ACK_TIMEOUT_MS || "5000", 10),
  pollIntervalMs: parseInt(process.env.DFX_POLL_INTERVAL_MS || "100", 10),
  receiveWaitMs: parseInt(process.env.DFX_RECEIVE_WAIT_MS || "250", 10),
  unrecognizedLimit: parseInt(process.env.DFX_UNRECOGNIZED_LIMIT || "64", 10),
};
