import { setTimeout as sleep } from "timers/promises";
import { SocketTransport } from "../../../transport/src/connection/socketTransport.js";
import { ResponseRouter } from "../../../transport/src/routing/responseRouter.js";
import {
  ProtoBodySerializer,
  type BodySerializer,
} from "../../../protocol/src/body.js";
import { config } from "../config.js";
import { Logger, logger as defaultLogger } from "../observability/logger.js";

/**
 * Everything a flow needs to talk over one socket. Flows sharing an
 * Exchange share its router, so a message received by one flow is visible
 * to the other.
 */
export interface Exchange {
  transport: SocketTransport;
  router: ResponseRouter;
  serializer: BodySerializer;
  logger: Logger;
}

export function createExchange(
  transport: SocketTransport,
  parts: Partial<Omit<Exchange, "transport">> = {}
): Exchange {
  return {
    transport,
    router: parts.router ?? new ResponseRouter(config.unrecognizedLimit),
    serializer: parts.serializer ?? new ProtoBodySerializer(),
    logger: parts.logger ?? defaultLogger,
  };
}

export interface PollOptions {
  /** Sleep between attempts while another flow holds the receive */
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

/**
 * One receive attempt. Whatever arrives is routed; returns whether anything
 * did.
 *
 * A socket failure while the signal is aborted counts as an empty poll: the
 * caller is shutting down and its loop returns on the next check.
 */
export async function receiveOnce(
  exchange: Exchange,
  signal?: AbortSignal,
  waitMs: number = config.receiveWaitMs
): Promise<boolean> {
  const { transport, router, logger } = exchange;

  let data: Buffer | undefined;
  try {
    data = await transport.tryReceiveOnce(waitMs);
  } catch (err) {
    if (signal?.aborted) return false;
    throw err;
  }
  if (!data) return false;

  const message = router.ingest(data, transport.connectionId);
  logger.inbound(message.connectionId, message.messageClass, data.length);
  return true;
}

/**
 * Back off while another flow owns the receive
 */
export async function idle(exchange: Exchange, pollIntervalMs: number): Promise<void> {
  if (exchange.transport.receiving) {
    await sleep(pollIntervalMs);
  }
}

/**
 * Send one frame and log it
 */
export async function sendFrame(exchange: Exchange, frame: Buffer): Promise<void> {
  exchange.logger.outbound(exchange.transport.connectionId, frame);
  await exchange.transport.send(frame);
}
