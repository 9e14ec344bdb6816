import { InvalidQuotaError } from "../../../protocol/src/errors.js";
import {
  MEASUREMENT_MODE_MAX_SECONDS,
  isMeasurementMode,
} from "../constants.js";

export interface ChunkPlan {
  videoLengthS: number;
  chunkLengthS: number;
  mode: string;
}

/**
 * Result chunks still owed to the caller, and how many one measurement can
 * hold.
 */
export class MeasurementCursor {
  constructor(
    public chunksRemaining: number,
    public readonly maxChunksPerMeasurement: number
  ) {
    if (!Number.isInteger(maxChunksPerMeasurement) || maxChunksPerMeasurement < 1) {
      throw new InvalidQuotaError(
        `maxChunksPerMeasurement must be a positive integer, got ${maxChunksPerMeasurement}`
      );
    }
  }

  static fromDurations({ videoLengthS, chunkLengthS, mode }: ChunkPlan): MeasurementCursor {
    const normalized = mode.toUpperCase();
    if (!isMeasurementMode(normalized)) {
      throw new RangeError(`Invalid measurement mode "${mode}"`);
    }
    if (!(chunkLengthS > 0)) {
      throw new RangeError(`Chunk length must be positive, got ${chunkLengthS}`);
    }

    const maxLength = MEASUREMENT_MODE_MAX_SECONDS[normalized];
    return new MeasurementCursor(
      Math.floor(videoLengthS / chunkLengthS),
      Math.floor(maxLength / chunkLengthS)
    );
  }

  /**
   * Reserve the chunks the next subscription cycle must deliver
   */
  allocate(): number {
    if (this.chunksRemaining < 0) {
      throw new InvalidQuotaError(
        `Invalid number of remaining chunks: ${this.chunksRemaining}`
      );
    }

    const allocated = Math.min(this.chunksRemaining, this.maxChunksPerMeasurement);
    this.chunksRemaining -= allocated;
    return allocated;
  }

  get done(): boolean {
    return this.chunksRemaining === 0;
  }
}
