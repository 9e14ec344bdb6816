import { ApiHttpClient } from "./http.js";
import { createdSchema, jsonSchema } from "./schemas.js";
import { chunkMeta } from "../../../protocol/src/body.js";
import { parseErrorCode } from "../../../protocol/src/status.js";
import type { AckOutcome, DataRequest } from "../../../protocol/src/types.js";
import type { MeasurementMode } from "../constants.js";

export interface CreateMeasurementRequest {
  studyId: string;
  mode: MeasurementMode;
  profileId?: string;
  resolution?: number;
}

/**
 * Measurement endpoints (50x)
 */
export class Measurements {
  constructor(private readonly http: ApiHttpClient) {}

  /**
   * 500 GET /measurements/:ID
   */
  async retrieve(token: string, measurementId: string): Promise<unknown> {
    if (!measurementId) {
      throw new TypeError("No measurement id given");
    }
    return this.http.request(
      "measurements.retrieve",
      {
        method: "GET",
        path: `/measurements/${encodeURIComponent(measurementId)}`,
        token,
      },
      jsonSchema
    );
  }

  /**
   * 504 POST /measurements
   */
  async create(token: string, request: CreateMeasurementRequest): Promise<string> {
    const res = await this.http.request(
      "measurements.create",
      {
        method: "POST",
        path: "/measurements",
        token,
        body: {
          StudyID: request.studyId,
          Resolution: request.resolution ?? 100,
          UserProfileID: request.profileId ?? "",
          Mode: request.mode,
        },
      },
      createdSchema
    );
    return res.ID;
  }

  /**
   * 506 POST /measurements/:ID/data
   *
   * Reports rejections as an outcome instead of throwing, like the
   * WebSocket upload.
   */
  async addData(token: string, request: DataRequest): Promise<AckOutcome> {
    const response = await this.http.send("measurements.addData", {
      method: "POST",
      path: `/measurements/${encodeURIComponent(request.measurementId)}/data`,
      token,
      body: {
        ChunkOrder: request.chunkOrder,
        Action: request.action,
        StartTime: request.startTime,
        EndTime: request.endTime,
        Duration: request.duration,
        Meta: JSON.stringify(chunkMeta(request)),
        Payload: Buffer.from(request.payload).toString("base64"),
      },
    });

    const body = Buffer.from(response.text, "utf8");
    if (response.status === 200) {
      return { kind: "success", status: 200, body };
    }
    return {
      kind: "rejected",
      status: response.status,
      code: parseErrorCode(response.json ?? response.text),
      body,
    };
  }
}
