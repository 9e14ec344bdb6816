import { ActionId } from "../../../protocol/src/constants.js";
import {
  encodeFrame,
  generateRequestId,
  readBody,
  readStatusCode,
} from "../../../protocol/src/frame.js";
import { parseErrorCode } from "../../../protocol/src/status.js";
import type { AckOutcome, DataRequest } from "../../../protocol/src/types.js";
import { config } from "../config.js";
import {
  type Exchange,
  type PollOptions,
  idle,
  receiveOnce,
  sendFrame,
} from "./exchange.js";

export interface UploadChunkOptions extends PollOptions {
  /** Give up when nothing has arrived for this long */
  timeoutMs?: number;
}

/**
 * Turn an addData status message into an outcome
 */
export function ackFromMessage(message: Buffer): AckOutcome {
  const status = Number(readStatusCode(message));
  const body = readBody(message);

  if (status === 200) {
    return { kind: "success", status: 200, body };
  }
  return { kind: "rejected", status, code: parseErrorCode(body), body };
}

/**
 * Send one chunk (action 0506) and wait for its acknowledgement.
 *
 * Exactly one frame goes out. Rotating to a new measurement after a
 * MEASUREMENT_CLOSED rejection is up to the caller.
 */
export async function uploadChunk(
  exchange: Exchange,
  request: DataRequest,
  options: UploadChunkOptions = {}
): Promise<AckOutcome> {
  const { signal } = options;
  const timeoutMs = options.timeoutMs ?? config.ackTimeoutMs;
  const pollIntervalMs = options.pollIntervalMs ?? config.pollIntervalMs;

  if (signal?.aborted) {
    return { kind: "aborted" };
  }

  const body = exchange.serializer.encodeDataRequest(request);
  const { buffer } = encodeFrame(ActionId.ADD_DATA, generateRequestId(), body);
  await sendFrame(exchange, buffer);

  let deadline = Date.now() + timeoutMs;

  while (true) {
    if (signal?.aborted) {
      return { kind: "aborted" };
    }

    const ack = exchange.router.popAddDataStatus();
    if (ack) {
      return ackFromMessage(ack.data);
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      exchange.logger.warn(
        `addData ack for chunk ${request.chunkOrder} timed out after ${timeoutMs}ms`
      );
      return { kind: "timedOut" };
    }

    const received = await receiveOnce(
      exchange,
      signal,
      Math.min(remaining, config.receiveWaitMs)
    );
    if (received) {
      deadline = Date.now() + timeoutMs;
    } else {
      await idle(exchange, pollIntervalMs);
    }
  }
}
