/**
 * Request body serialization
 *
 * Frame bodies are protobuf messages described in proto/measurements.proto,
 * loaded at run time.
 */

import { fileURLToPath } from "url";
import protobuf from "protobufjs";
import type { Type } from "protobufjs";
import type { DataRequest } from "./types.js";
import { ProtocolError } from "./errors.js";

export const DEFAULT_PROTO_PATH = fileURLToPath(
  new URL("../proto/measurements.proto", import.meta.url)
);

export interface BodySerializer {
  encodeDataRequest(request: DataRequest): Uint8Array;
  encodeSubscribeRequest(measurementId: string, requestId: string): Uint8Array;
}

/**
 * Meta sent with each chunk: caller fields plus the chunk timing
 */
export function chunkMeta(request: DataRequest): Record<string, unknown> {
  return {
    ...request.meta,
    Order: request.chunkOrder,
    StartTime: request.startTime,
    EndTime: request.endTime,
    Duration: request.duration,
  };
}

export class ProtoBodySerializer implements BodySerializer {
  private dataRequest: Type;
  private subscribeRequest: Type;

  constructor(protoPath: string = DEFAULT_PROTO_PATH) {
    const root = protobuf.loadSync(protoPath);
    this.dataRequest = root.lookupType("dfxapi.measurements.DataRequest");
    this.subscribeRequest = root.lookupType(
      "dfxapi.measurements.SubscribeResultsRequest"
    );
  }

  encodeDataRequest(request: DataRequest): Uint8Array {
    return this.encode(this.dataRequest, {
      Params: { ID: request.measurementId },
      ChunkOrder: request.chunkOrder,
      Action: request.action,
      StartTime: request.startTime,
      EndTime: request.endTime,
      Duration: request.duration,
      Meta: Buffer.from(JSON.stringify(chunkMeta(request)), "utf8"),
      Payload: request.payload,
    });
  }

  encodeSubscribeRequest(measurementId: string, requestId: string): Uint8Array {
    return this.encode(this.subscribeRequest, {
      Params: { ID: measurementId },
      RequestID: requestId,
    });
  }

  private encode(type: Type, fields: Record<string, unknown>): Uint8Array {
    const problem = type.verify(fields);
    if (problem) {
      throw new ProtocolError(`Invalid ${type.name}: ${problem}`);
    }
    return type.encode(type.create(fields)).finish();
  }
}
