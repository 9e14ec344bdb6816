import { EventEmitter, once } from "events";
import { setTimeout as sleep } from "timers/promises";
import { ValiError } from "valibot";
import { SocketTransport } from "../../transport/src/connection/socketTransport.js";
import {
  ProtoBodySerializer,
  type BodySerializer,
} from "../../protocol/src/body.js";
import {
  ApiError,
  AuthenticationError,
  SubscriptionRejectedError,
} from "../../protocol/src/errors.js";
import { ErrorCode, isMeasurementClosed } from "../../protocol/src/status.js";
import type {
  AckOutcome,
  ChunkAction,
  DataRequest,
} from "../../protocol/src/types.js";
import { config } from "./config.js";
import {
  DEFAULT_DEVICE_NAME,
  isMeasurementMode,
  resolveServer,
  type MeasurementMode,
  type ServerUrls,
} from "./constants.js";
import { createExchange, type Exchange } from "./flows/exchange.js";
import { uploadChunk } from "./flows/uploadChunk.js";
import {
  subscribeResults,
  type ResultSink,
  type SubscriptionOutcome,
} from "./flows/subscribeResults.js";
import { MeasurementCursor } from "./measurement/cursor.js";
import { logger } from "./observability/logger.js";
import { ApiHttpClient } from "./rest/http.js";
import { Measurements } from "./rest/measurements.js";
import { Organizations } from "./rest/organizations.js";
import { Users, type UserProfile } from "./rest/users.js";
import {
  InMemorySessionStore,
  type SessionStore,
} from "./session/sessionStore.js";

export type AddMethod = "REST" | "WEBSOCKET";

export interface DfxClientOptions {
  licenseKey: string;
  studyId: string;
  user: UserProfile;
  /** Deployment id ("prod", "qa", ...). Ignored when `urls` is given. */
  server?: string;
  urls?: ServerUrls;
  deviceName?: string;
  addMethod?: AddMethod;
  measurementMode?: string;
  chunkLengthS?: number;
  videoLengthS?: number;
  /** Wait one chunk duration after each upload, to stay under the rate limit */
  paceUploads?: boolean;
  ackTimeoutMs?: number;
  pollIntervalMs?: number;
  store?: SessionStore;
  bodySerializer?: BodySerializer;
}

/**
 * One chunk of measurement data as produced by the collection SDK
 */
export interface PayloadChunk {
  chunkNumber: number;
  numberChunks: number;
  startTimeS: number;
  endTimeS: number;
  durationS: number;
  payload: Uint8Array;
  metadata?: Record<string, unknown>;
}

export function chunkAction(chunkNumber: number, numberChunks: number): ChunkAction {
  if (chunkNumber === 0 && numberChunks > 1) return "FIRST::PROCESS";
  if (chunkNumber === numberChunks - 1) return "LAST::PROCESS";
  return "CHUNK::PROCESS";
}

function isTokenRejection(err: unknown): boolean {
  return (
    err instanceof ApiError &&
    (err.status === 401 ||
      err.status === 403 ||
      err.code === ErrorCode.INVALID_TOKEN)
  );
}

/**
 * DfxClient - registers the device, logs the user in, creates measurements,
 * uploads chunks and streams results.
 *
 * Uploads and the result subscription share one WebSocket. When the server
 * closes a measurement (its length limit is reached) the next upload rotates
 * to a fresh measurement and the subscription follows it.
 *
 * Events: measurementCreated(id), measurementRotated(id),
 * chunkDelivered(index, payload), uploadRejected(outcome), cycleComplete()
 */
export class DfxClient extends EventEmitter {
  private readonly urls: ServerUrls;
  private readonly mode: MeasurementMode;
  private readonly store: SessionStore;
  private readonly organizations: Organizations;
  private readonly users: Users;
  private readonly measurements: Measurements;
  private readonly cursor: MeasurementCursor;
  private readonly controller = new AbortController();

  private serializer: BodySerializer | undefined;
  private transport: SocketTransport | null = null;
  private exchange: Exchange | null = null;
  private connecting: Promise<Exchange> | null = null;
  private rotation: Promise<string> | null = null;

  // Socket closes once both are done
  private uploadsDone: boolean = true;
  private subscriptionDone: boolean = true;
  private cycleActive: boolean = false;

  constructor(private readonly options: DfxClientOptions) {
    super();
    this.urls = options.urls ?? resolveServer(options.server ?? "prod");

    const mode = (options.measurementMode ?? "DISCRETE").toUpperCase();
    if (!isMeasurementMode(mode)) {
      throw new RangeError(`Invalid measurement mode "${options.measurementMode}"`);
    }
    this.mode = mode;

    this.cursor = MeasurementCursor.fromDurations({
      videoLengthS: options.videoLengthS ?? 60,
      chunkLengthS: options.chunkLengthS ?? 15,
      mode,
    });

    this.store = options.store ?? new InMemorySessionStore();
    this.serializer = options.bodySerializer;

    const http = new ApiHttpClient(this.urls.restUrl);
    this.organizations = new Organizations(http, options.licenseKey);
    this.users = new Users(http);
    this.measurements = new Measurements(http);
  }

  /**
   * Obtain a device token and a user token, reusing stored ones
   */
  async setup(): Promise<void> {
    let deviceToken = this.store.get("deviceToken");
    if (!deviceToken) {
      deviceToken = await this.registerDevice();
    }

    if (!this.store.get("userToken")) {
      this.store.set("userToken", await this.login(deviceToken));
      logger.info(`Logged in as ${this.options.user.email}`);
    }
  }

  private async registerDevice(): Promise<string> {
    try {
      const registration = await this.organizations.registerLicense(
        this.options.deviceName ?? DEFAULT_DEVICE_NAME
      );
      this.store.set("deviceToken", registration.token);
      if (registration.deviceId) {
        this.store.set("deviceId", registration.deviceId);
      }
      logger.info("Device registered");
      return registration.token;
    } catch (err) {
      if (err instanceof ApiError) {
        throw new AuthenticationError(
          "Registration error. Make sure your license key is valid for the selected server.",
          err.code
        );
      }
      if (err instanceof ValiError) {
        throw new AuthenticationError("Registration response carried no device token.");
      }
      throw err;
    }
  }

  /**
   * Log in, creating the user first when the server does not know it
   */
  private async login(deviceToken: string): Promise<string> {
    const { email, password } = this.options.user;

    try {
      return await this.users.login(deviceToken, email, password);
    } catch (err) {
      if (!(err instanceof ApiError)) throw err;
      if (err.code === ErrorCode.INVALID_PASSWORD) {
        throw new AuthenticationError("Incorrect login password.", err.code);
      }
      if (err.code !== ErrorCode.INVALID_USER) throw err;
    }

    try {
      const userId = await this.users.create(deviceToken, this.options.user);
      this.store.set("userId", userId);
      logger.info(`Created user ${email}`);
    } catch (err) {
      if (err instanceof ApiError) {
        throw new AuthenticationError(
          "Cannot create new user. Check your license permissions.",
          err.code
        );
      }
      throw err;
    }

    return this.users.login(deviceToken, email, password);
  }

  private requireUserToken(): string {
    const token = this.store.get("userToken");
    if (!token) {
      throw new AuthenticationError("No user token available. Call setup() first.");
    }
    return token;
  }

  private requireMeasurementId(): string {
    const id = this.store.get("measurementId");
    if (!id) {
      throw new TypeError("No measurement id available. Call createMeasurement() first.");
    }
    return id;
  }

  /**
   * Create a measurement and make it current. A rejected user token is
   * dropped and setup() rerun before one retry.
   */
  async createMeasurement(): Promise<string> {
    const request = {
      studyId: this.options.studyId,
      mode: this.mode,
      profileId: "",
    };

    let measurementId: string;
    try {
      measurementId = await this.measurements.create(this.requireUserToken(), request);
    } catch (err) {
      if (!isTokenRejection(err)) throw err;

      logger.warn("User token rejected, logging in again");
      this.store.delete("userToken");
      await this.setup();
      measurementId = await this.measurements.create(this.requireUserToken(), request);
    }

    this.store.set("measurementId", measurementId);
    logger.info(`Created measurement ${measurementId}`);
    this.emit("measurementCreated", measurementId);
    return measurementId;
  }

  /**
   * Retrieve results of a measurement (the current one by default)
   */
  async retrieveResults(measurementId?: string): Promise<unknown> {
    return this.measurements.retrieve(
      this.requireUserToken(),
      measurementId ?? this.requireMeasurementId()
    );
  }

  /**
   * Upload one chunk to the current measurement
   */
  async addChunk(chunk: PayloadChunk): Promise<AckOutcome> {
    const action = chunkAction(chunk.chunkNumber, chunk.numberChunks);
    const request: DataRequest = {
      measurementId: this.requireMeasurementId(),
      chunkOrder: chunk.chunkNumber,
      action,
      startTime: chunk.startTimeS,
      endTime: chunk.endTimeS,
      duration: chunk.durationS,
      payload: chunk.payload,
      meta: chunk.metadata,
    };

    this.uploadsDone = false;

    let outcome: AckOutcome;
    try {
      outcome = await this.sendChunk(request);
      if (outcome.kind === "rejected") {
        this.emit("uploadRejected", outcome);
        if (isMeasurementClosed(outcome.status, outcome.code)) {
          outcome = await this.resendToNewMeasurement(request);
        }
      }
    } catch (err) {
      this.uploadsDone = true;
      this.closeWhenIdle();
      throw err;
    }

    if (outcome.kind !== "success") {
      logger.warn(`Chunk ${chunk.chunkNumber} not accepted`, {
        outcome: outcome.kind,
        status: outcome.kind === "rejected" ? outcome.status : undefined,
      });
    }
    if (outcome.kind !== "success" || action === "LAST::PROCESS") {
      this.uploadsDone = true;
    }

    if (this.options.paceUploads ?? true) {
      await this.pause(chunk.durationS * 1000);
    }
    this.closeWhenIdle();
    return outcome;
  }

  private async sendChunk(request: DataRequest): Promise<AckOutcome> {
    if (this.controller.signal.aborted) {
      return { kind: "aborted" };
    }
    if (this.options.addMethod === "WEBSOCKET") {
      let exchange: Exchange;
      try {
        exchange = await this.connectExchange();
      } catch (err) {
        if (this.controller.signal.aborted) return { kind: "aborted" };
        throw err;
      }
      return uploadChunk(exchange, request, {
        timeoutMs: this.options.ackTimeoutMs,
        pollIntervalMs: this.options.pollIntervalMs,
        signal: this.controller.signal,
      });
    }
    return this.measurements.addData(this.requireUserToken(), request);
  }

  /**
   * The server closed the measurement: move to a new one and send the chunk
   * again there
   */
  private async resendToNewMeasurement(request: DataRequest): Promise<AckOutcome> {
    let measurementId: string;
    try {
      this.rotation ??= this.rotateMeasurement().finally(() => {
        this.rotation = null;
      });
      measurementId = await this.rotation;
    } catch (err) {
      if (this.controller.signal.aborted) return { kind: "aborted" };
      throw err;
    }

    return this.sendChunk({ ...request, measurementId });
  }

  private async rotateMeasurement(): Promise<string> {
    const previous = this.requireMeasurementId();

    // Let the subscription finish receiving the closed measurement first
    if (this.cycleActive) {
      await once(this, "cycleComplete", { signal: this.controller.signal });
    }

    try {
      const results = await this.retrieveResults(previous);
      logger.debug(`Results of ${previous}`, results);
    } catch (err) {
      if (!(err instanceof ApiError)) throw err;
      logger.warn(`Could not retrieve results of ${previous}: ${err.message}`);
    }

    const measurementId = await this.createMeasurement();
    logger.info(`Rotated from ${previous} to ${measurementId}`);
    this.emit("measurementRotated", measurementId);
    return measurementId;
  }

  /**
   * Stream result chunks of the current measurement, and of every
   * measurement it rotates to, into the sink. Returns the number of chunks
   * delivered.
   */
  async subscribeToResults(sink: ResultSink): Promise<number> {
    const { signal } = this.controller;
    let measurementId = this.requireMeasurementId();
    let chunkIndex = 0;

    const deliver: ResultSink = async (payload, index) => {
      this.emit("chunkDelivered", index, payload);
      await sink(payload, index);
    };

    this.subscriptionDone = false;
    try {
      while (!signal.aborted) {
        const outcome = await this.runSubscriptionCycle(measurementId, chunkIndex, deliver);
        chunkIndex += outcome.chunksDelivered;
        if (outcome.done) break;

        measurementId = await this.nextMeasurement(measurementId);
      }
    } catch (err) {
      if (!signal.aborted || err instanceof SubscriptionRejectedError) throw err;
    } finally {
      this.subscriptionDone = true;
      this.closeWhenIdle();
    }

    return chunkIndex;
  }

  private async runSubscriptionCycle(
    measurementId: string,
    startingChunkIndex: number,
    sink: ResultSink
  ): Promise<SubscriptionOutcome> {
    this.cycleActive = true;
    try {
      return await subscribeResults(
        await this.connectExchange(),
        { measurementId, startingChunkIndex, sink, cursor: this.cursor },
        {
          pollIntervalMs: this.options.pollIntervalMs,
          signal: this.controller.signal,
        }
      );
    } finally {
      this.cycleActive = false;
      this.emit("cycleComplete");
    }
  }

  /**
   * Wait until uploads have moved on from `previous`
   */
  private async nextMeasurement(previous: string): Promise<string> {
    const current = this.store.get("measurementId");
    if (current && current !== previous) return current;

    await once(this, "measurementRotated", { signal: this.controller.signal });
    return this.requireMeasurementId();
  }

  /**
   * Shared socket, opened on first use
   */
  private connectExchange(): Promise<Exchange> {
    if (this.exchange) return Promise.resolve(this.exchange);

    this.connecting ??= this.openExchange().finally(() => {
      this.connecting = null;
    });
    return this.connecting;
  }

  private async openExchange(): Promise<Exchange> {
    const transport = new SocketTransport({
      url: this.urls.websocketUrl,
      token: this.requireUserToken(),
      receiveWaitMs: config.receiveWaitMs,
    });
    const { connectionId } = transport;

    transport.on("state", (state: string) => {
      logger.stateTransition(connectionId, state);
    });
    transport.on("error", (error: { reason: string; fatal: boolean }) => {
      logger.error(`[${connectionId}] Socket error: ${error.reason}`, {
        fatal: error.fatal,
      });
    });
    transport.on("close", (stats: { bytesSent: number; bytesReceived: number }) => {
      logger.debug(`[${connectionId}] Closed`, {
        sent: `${stats.bytesSent}B`,
        received: `${stats.bytesReceived}B`,
      });
      if (this.transport === transport) {
        this.transport = null;
        this.exchange = null;
      }
    });

    // Visible to shutdown() while the handshake runs
    this.transport = transport;
    await transport.connect();

    this.serializer ??= new ProtoBodySerializer();
    this.exchange = createExchange(transport, { serializer: this.serializer });
    return this.exchange;
  }

  private async pause(ms: number): Promise<void> {
    try {
      await sleep(ms, undefined, { signal: this.controller.signal });
    } catch (err) {
      if (!this.controller.signal.aborted) throw err;
    }
  }

  private closeWhenIdle(): void {
    if (this.uploadsDone && this.subscriptionDone && this.transport) {
      logger.debug("Uploads and subscription finished, closing socket");
      this.transport.close();
    }
  }

  /**
   * Stop all uploads and subscriptions and close the socket
   */
  shutdown(): void {
    this.controller.abort();
    this.uploadsDone = true;
    this.subscriptionDone = true;
    this.transport?.close();
  }

  get isShutdown(): boolean {
    return this.controller.signal.aborted;
  }
}
