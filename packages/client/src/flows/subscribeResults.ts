import { ActionId, STATUS_OK } from "../../../protocol/src/constants.js";
import {
  encodeFrame,
  generateRequestId,
  readBody,
  readStatusField,
} from "../../../protocol/src/frame.js";
import { SubscriptionRejectedError } from "../../../protocol/src/errors.js";
import { MeasurementCursor } from "../measurement/cursor.js";
import { config } from "../config.js";
import {
  type Exchange,
  type PollOptions,
  idle,
  receiveOnce,
  sendFrame,
} from "./exchange.js";

export type ResultSink = (payload: Buffer, chunkIndex: number) => void | Promise<void>;

export interface SubscribeRequest {
  measurementId: string;
  /** Index given to the first chunk delivered by this call */
  startingChunkIndex: number;
  sink: ResultSink;
  cursor: MeasurementCursor;
}

export interface SubscriptionOutcome {
  done: boolean;
  chunksDelivered: number;
}

/**
 * Subscribe to one measurement's results (action 0510) and feed result
 * chunks to the sink until this cycle's quota is delivered.
 *
 * There is no local timeout: the server ends a measurement by closing it.
 * Cancellation returns `done: true` with whatever was delivered; a rejected
 * subscription (any status field other than "200") throws regardless.
 */
export async function subscribeResults(
  exchange: Exchange,
  request: SubscribeRequest,
  options: PollOptions = {}
): Promise<SubscriptionOutcome> {
  const { measurementId, startingChunkIndex, sink, cursor } = request;
  const { signal } = options;
  const pollIntervalMs = options.pollIntervalMs ?? config.pollIntervalMs;

  const allocated = cursor.allocate();
  let delivered = 0;

  if (allocated === 0) {
    return { done: cursor.done, chunksDelivered: 0 };
  }
  if (signal?.aborted) {
    return { done: true, chunksDelivered: 0 };
  }

  const requestId = generateRequestId();
  const body = exchange.serializer.encodeSubscribeRequest(measurementId, requestId);
  const { buffer } = encodeFrame(ActionId.SUBSCRIBE_RESULTS, requestId, body);
  await sendFrame(exchange, buffer);

  exchange.logger.debug(`Subscribed to ${measurementId}`, {
    allocated,
    startingChunkIndex,
  });

  while (delivered < allocated) {
    // A refusal wins over cancellation
    const status = exchange.router.popSubscribeStatus();
    if (status) {
      const code = readStatusField(status.data);
      if (code !== STATUS_OK) {
        throw new SubscriptionRejectedError(measurementId, code);
      }
      continue;
    }

    if (signal?.aborted) {
      return { done: true, chunksDelivered: delivered };
    }

    const chunk = exchange.router.popResultChunk();
    if (chunk) {
      await sink(readBody(chunk.data), startingChunkIndex + delivered);
      delivered++;
      continue;
    }

    if (!(await receiveOnce(exchange, signal))) {
      await idle(exchange, pollIntervalMs);
    }
  }

  return { done: cursor.done, chunksDelivered: delivered };
}
