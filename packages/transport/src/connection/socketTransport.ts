import WebSocket from "ws";
import type { RawData } from "ws";
import { EventEmitter } from "events";
import { generateRequestId } from "../../../protocol/src/frame.js";
import {
  NotConnectedError,
  TransportError,
} from "../../../protocol/src/errors.js";

export enum TransportState {
  DISCONNECTED = "DISCONNECTED",
  CONNECTING = "CONNECTING",
  CONNECTED = "CONNECTED",
  CLOSED = "CLOSED",
}

export interface SocketTransportOptions {
  url: string;
  token: string;
  /** Default wait of tryReceiveOnce, in ms */
  receiveWaitMs?: number;
}

type PendingReceive = {
  resolve: (data: Buffer | undefined) => void;
  reject: (err: TransportError) => void;
};

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * SocketTransport owns one WebSocket to the DFX API.
 *
 * Responsibilities:
 * - Connection lifecycle (DISCONNECTED → CONNECTING → CONNECTED → CLOSED)
 * - Whole-frame sends
 * - Buffering inbound messages until someone receives them
 * - Allowing at most one receive in flight
 *
 * Does NOT:
 * - Classify or route messages
 * - Reconnect (CLOSED is terminal; create a new transport)
 */
export class SocketTransport extends EventEmitter {
  private socket: WebSocket | null = null;
  private state: TransportState = TransportState.DISCONNECTED;
  public readonly connectionId: string = generateRequestId();

  private inbox: Buffer[] = [];
  private pending: PendingReceive | null = null;

  // Statistics
  private bytesSent: number = 0;
  private bytesReceived: number = 0;

  constructor(private readonly options: SocketTransportOptions) {
    super();
  }

  /**
   * Open the socket
   */
  connect(): Promise<void> {
    this.transition(TransportState.CONNECTING);

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(this.options.url, {
        headers: { Authorization: `Bearer ${this.options.token}` },
      });
      this.socket = socket;
      this.wireSocket(socket, { resolve, reject });
    });
  }

  /**
   * Bind socket events to transport behavior
   */
  private wireSocket(
    socket: WebSocket,
    opening: { resolve: () => void; reject: (err: TransportError) => void }
  ): void {
    let opened = false;

    socket.on("open", () => {
      opened = true;
      this.transition(TransportState.CONNECTED);
      opening.resolve();
    });

    socket.on("message", (data: RawData) => {
      if (this.state === TransportState.CLOSED) return;
      const message = toBuffer(data);
      this.bytesReceived += message.length;
      this.deliver(message);
    });

    socket.on("close", () => {
      if (!opened) {
        opening.reject(new TransportError("Socket closed before it was opened"));
      }
      this.handleClose();
    });

    socket.on("error", (err) => {
      if (opened) {
        this.report(err.message, true);
      } else {
        opening.reject(
          new TransportError(`Connection failed: ${err.message}`, { cause: err })
        );
      }
      this.close();
    });
  }

  /**
   * Hand a message to the pending receive, or buffer it
   */
  private deliver(message: Buffer): void {
    if (this.pending) {
      this.pending.resolve(message);
    } else {
      this.inbox.push(message);
    }
  }

  /**
   * Send one complete frame
   */
  send(frame: Buffer): Promise<void> {
    const socket = this.requireConnected();

    return new Promise((resolve, reject) => {
      socket.send(frame, { binary: true }, (err) => {
        if (err) {
          this.report(err.message, true);
          reject(new TransportError(`Send failed: ${err.message}`, { cause: err }));
          return;
        }
        this.bytesSent += frame.length;
        resolve();
      });
    });
  }

  /**
   * Attempt exactly one receive.
   *
   * Resolves undefined straight away when another receive is already in
   * flight, and after `waitMs` when nothing arrived. Callers poll.
   */
  async tryReceiveOnce(
    waitMs: number = this.options.receiveWaitMs ?? 250
  ): Promise<Buffer | undefined> {
    this.requireConnected();
    if (this.pending) return undefined;

    const buffered = this.inbox.shift();
    if (buffered) return buffered;

    return new Promise<Buffer | undefined>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const settle = (finish: () => void) => {
        clearTimeout(timer);
        this.pending = null;
        finish();
      };
      this.pending = {
        resolve: (data) => settle(() => resolve(data)),
        reject: (err) => settle(() => reject(err)),
      };
      timer = setTimeout(() => settle(() => resolve(undefined)), waitMs);
    });
  }

  /**
   * True while a receive is in flight
   */
  get receiving(): boolean {
    return this.pending !== null;
  }

  /**
   * Close the socket. Safe to call repeatedly.
   */
  close(): void {
    if (
      this.state === TransportState.DISCONNECTED ||
      this.state === TransportState.CLOSED
    ) {
      return;
    }

    const socket = this.socket;
    this.handleClose();
    socket?.close();
  }

  /**
   * Handle socket close
   */
  private handleClose(): void {
    if (this.state === TransportState.CLOSED) return;

    this.transition(TransportState.CLOSED);
    this.socket = null;
    this.inbox = [];
    this.pending?.reject(new TransportError("Socket closed while receiving"));
    this.emit("close", {
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
    });
  }

  /**
   * Emit an error event when someone is listening
   */
  private report(reason: string, fatal: boolean): void {
    if (this.listenerCount("error") > 0) {
      this.emit("error", { reason, fatal });
    }
  }

  private requireConnected(): WebSocket {
    if (this.state !== TransportState.CONNECTED || !this.socket) {
      throw new NotConnectedError(this.state);
    }
    return this.socket;
  }

  /**
   * Transition to a new state
   */
  private transition(next: TransportState): void {
    if (this.state === next) return;

    if (!this.isTransitionAllowed(this.state, next)) {
      throw new Error(`Invalid state transition: ${this.state} → ${next}`);
    }

    this.state = next;
    this.emit("state", next);
  }

  /**
   * Check if a state transition is valid
   */
  private isTransitionAllowed(
    from: TransportState,
    to: TransportState
  ): boolean {
    const transitions: Record<TransportState, TransportState[]> = {
      [TransportState.DISCONNECTED]: [TransportState.CONNECTING],
      [TransportState.CONNECTING]: [
        TransportState.CONNECTED,
        TransportState.CLOSED,
      ],
      [TransportState.CONNECTED]: [TransportState.CLOSED],
      [TransportState.CLOSED]: [],
    };

    return transitions[from].includes(to);
  }

  /**
   * Get current transport state
   */
  getState(): TransportState {
    return this.state;
  }

  /**
   * Get transport statistics
   */
  getStats() {
    return {
      connectionId: this.connectionId,
      state: this.state,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      buffered: this.inbox.length,
    };
  }
}
