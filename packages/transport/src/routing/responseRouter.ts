import {
  classifyMessage,
  readConnectionId,
} from "../../../protocol/src/frame.js";
import { MessageClass } from "../../../protocol/src/constants.js";
import type { InboundMessage } from "../../../protocol/src/types.js";

export const DEFAULT_UNRECOGNIZED_LIMIT = 64;

/**
 * ResponseRouter sorts inbound messages into one FIFO per message class.
 *
 * Responsibilities:
 * - Classify each message by length and queue it
 * - Hand queued messages out oldest first
 * - Remember the latest message per unrecognized sender (diagnostics only)
 *
 * Does NOT:
 * - Inspect or validate message bodies
 * - Receive from the socket (flows feed it)
 */
export class ResponseRouter {
  private queues: Record<MessageClass, InboundMessage[]> = {
    [MessageClass.SUBSCRIBE_STATUS]: [],
    [MessageClass.ADD_DATA_STATUS]: [],
    [MessageClass.RESULT_CHUNK]: [],
  };

  // Insertion order doubles as recency order
  private unknownSenders: Map<string, Buffer> = new Map();

  constructor(
    private readonly unrecognizedLimit: number = DEFAULT_UNRECOGNIZED_LIMIT
  ) {}

  /**
   * Queue one inbound message
   */
  ingest(data: Buffer, selfConnectionId: string): InboundMessage {
    const message: InboundMessage = {
      messageClass: classifyMessage(data),
      connectionId: readConnectionId(data),
      data,
    };

    if (message.connectionId !== selfConnectionId) {
      this.recordUnrecognized(message.connectionId, data);
    }

    this.queues[message.messageClass].push(message);
    return message;
  }

  popSubscribeStatus(): InboundMessage | undefined {
    return this.queues[MessageClass.SUBSCRIBE_STATUS].shift();
  }

  popAddDataStatus(): InboundMessage | undefined {
    return this.queues[MessageClass.ADD_DATA_STATUS].shift();
  }

  popResultChunk(): InboundMessage | undefined {
    return this.queues[MessageClass.RESULT_CHUNK].shift();
  }

  /**
   * Number of queued messages of one class
   */
  size(messageClass: MessageClass): number {
    return this.queues[messageClass].length;
  }

  /**
   * Latest message per unrecognized sender, oldest sender first
   */
  unrecognized(): ReadonlyMap<string, Buffer> {
    return new Map(this.unknownSenders);
  }

  /**
   * Drop everything queued (session teardown)
   */
  clear(): void {
    for (const queue of Object.values(this.queues)) {
      queue.length = 0;
    }
    this.unknownSenders.clear();
  }

  private recordUnrecognized(connectionId: string, data: Buffer): void {
    if (this.unrecognizedLimit <= 0) return;

    this.unknownSenders.delete(connectionId);
    this.unknownSenders.set(connectionId, data);

    while (this.unknownSenders.size > this.unrecognizedLimit) {
      const oldest = this.unknownSenders.keys().next();
      if (oldest.done) break;
      this.unknownSenders.delete(oldest.value);
    }
  }
}
