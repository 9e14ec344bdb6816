/**
 * DFX API client entry point
 */

export {
  DfxClient,
  chunkAction,
  type AddMethod,
  type DfxClientOptions,
  type PayloadChunk,
} from "./client.js";
export { config } from "./config.js";
export {
  SERVERS,
  MEASUREMENT_MODE_MAX_SECONDS,
  resolveServer,
  type MeasurementMode,
  type ServerId,
  type ServerUrls,
} from "./constants.js";
export { createExchange, type Exchange, type PollOptions } from "./flows/exchange.js";
export { uploadChunk, type UploadChunkOptions } from "./flows/uploadChunk.js";
export {
  subscribeResults,
  type ResultSink,
  type SubscribeRequest,
  type SubscriptionOutcome,
} from "./flows/subscribeResults.js";
export { MeasurementCursor, type ChunkPlan } from "./measurement/cursor.js";
export { Logger, LogLevel, logger } from "./observability/logger.js";
export { ApiHttpClient } from "./rest/http.js";
export { Measurements, type CreateMeasurementRequest } from "./rest/measurements.js";
export { Organizations, type DeviceRegistration } from "./rest/organizations.js";
export { Users, type UserProfile } from "./rest/users.js";
export {
  InMemorySessionStore,
  type SessionKey,
  type SessionStore,
} from "./session/sessionStore.js";

export {
  SocketTransport,
  TransportState,
} from "../../transport/src/connection/socketTransport.js";
export { ResponseRouter } from "../../transport/src/routing/responseRouter.js";
export { ProtoBodySerializer, type BodySerializer } from "../../protocol/src/body.js";
export { ActionId, MessageClass } from "../../protocol/src/constants.js";
export * from "../../protocol/src/errors.js";
export { ErrorCode, parseErrorCode, isMeasurementClosed } from "../../protocol/src/status.js";
export type {
  AckOutcome,
  ChunkAction,
  DataRequest,
  InboundMessage,
} from "../../protocol/src/types.js";
