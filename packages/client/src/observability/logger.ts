/**
 * Centralized logging with debug mode support
 */

import { config } from "../config.js";
import { splitFrame } from "../../../protocol/src/frame.js";
import { MessageClass } from "../../../protocol/src/constants.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

export class Logger {
  private debugEnabled: boolean;

  constructor(debugEnabled: boolean = config.debug) {
    this.debugEnabled = debugEnabled;
  }

  /**
   * Format timestamp
   */
  private timestamp(): string {
    return new Date().toISOString();
  }

  /**
   * Format log message
   */
  private format(level: LogLevel, message: string, meta?: unknown): string {
    const metaStr = meta ? ` ${JSON.stringify(meta)}` : "";
    return `[${this.timestamp()}] [${level}] ${message}${metaStr}`;
  }

  /**
   * Debug logs (only when DFX_DEBUG=1)
   */
  debug(message: string, meta?: unknown): void {
    if (this.debugEnabled) {
      console.log(this.format(LogLevel.DEBUG, message, meta));
    }
  }

  /**
   * Info logs
   */
  info(message: string, meta?: unknown): void {
    console.log(this.format(LogLevel.INFO, message, meta));
  }

  /**
   * Warning logs
   */
  warn(message: string, meta?: unknown): void {
    console.warn(this.format(LogLevel.WARN, message, meta));
  }

  /**
   * Error logs
   */
  error(message: string, meta?: unknown): void {
    console.error(this.format(LogLevel.ERROR, message, meta));
  }

  /**
   * Log an outbound frame (debug only)
   */
  outbound(connectionId: string, frame: Buffer): void {
    if (!this.debugEnabled) return;

    const { actionId, requestId, body } = splitFrame(frame);
    this.debug(`[${connectionId}] → Frame`, {
      actionId,
      requestId,
      bodySize: `${body.length}B`,
    });
  }

  /**
   * Log an inbound message (debug only)
   */
  inbound(connectionId: string, messageClass: MessageClass, size: number): void {
    if (!this.debugEnabled) return;

    this.debug(`[${connectionId}] ← ${messageClass}`, { size: `${size}B` });
  }

  /**
   * Log state transition (debug only)
   */
  stateTransition(connectionId: string, to: string, reason?: string): void {
    if (!this.debugEnabled) return;

    this.debug(
      `[${connectionId}] State: ${to}`,
      reason ? { reason } : undefined
    );
  }
}

export const logger = new Logger();
