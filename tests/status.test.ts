import { describe, it, expect } from "vitest";
import {
  ErrorCode,
  isMeasurementClosed,
  parseErrorCode,
} from "../packages/protocol/src/status.js";

describe("parseErrorCode", () => {
  it("reads Code from a JSON string", () => {
    expect(parseErrorCode('{"Code":"MEASUREMENT_CLOSED"}')).toBe("MEASUREMENT_CLOSED");
  });

  it("reads Code from raw bytes", () => {
    expect(parseErrorCode(Buffer.from('{"Code":"INVALID_TOKEN"}'))).toBe("INVALID_TOKEN");
  });

  it("reads Code from a decoded object with other fields", () => {
    expect(parseErrorCode({ Code: "INVALID_USER", Message: "Unknown user" })).toBe("INVALID_USER");
  });

  it("accepts a bare code token", () => {
    expect(parseErrorCode("MEASUREMENT_CLOSED\n")).toBe("MEASUREMENT_CLOSED");
  });

  it("returns undefined when there is no code", () => {
    expect(parseErrorCode("not found")).toBeUndefined();
    expect(parseErrorCode("{}")).toBeUndefined();
    expect(parseErrorCode('{"Code":5}')).toBeUndefined();
    expect(parseErrorCode(undefined)).toBeUndefined();
    expect(parseErrorCode(Buffer.alloc(0))).toBeUndefined();
  });
});

describe("isMeasurementClosed", () => {
  it("matches 400 and 405 with MEASUREMENT_CLOSED", () => {
    expect(isMeasurementClosed(400, ErrorCode.MEASUREMENT_CLOSED)).toBe(true);
    expect(isMeasurementClosed(405, ErrorCode.MEASUREMENT_CLOSED)).toBe(true);
  });

  it("ignores other statuses and codes", () => {
    expect(isMeasurementClosed(500, ErrorCode.MEASUREMENT_CLOSED)).toBe(false);
    expect(isMeasurementClosed(400, ErrorCode.INVALID_TOKEN)).toBe(false);
    expect(isMeasurementClosed(400, undefined)).toBe(false);
  });
});
