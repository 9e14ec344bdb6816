import { describe, it, expect } from "vitest";
import fc from "fast-check";
import {
  classifyMessage,
  encodeFrame,
  generateRequestId,
  readBody,
  readConnectionId,
  readStatusCode,
  readStatusField,
  splitFrame,
} from "../packages/protocol/src/frame.js";
import { ActionId, MessageClass } from "../packages/protocol/src/constants.js";
import { InvalidFrameError } from "../packages/protocol/src/errors.js";

describe("encodeFrame", () => {
  it("lays out action id, request id and body", () => {
    const { buffer } = encodeFrame(ActionId.ADD_DATA, "abcdef1234", Buffer.from([1, 2, 3]));

    expect(buffer.length).toBe(17);
    expect(buffer.toString("latin1", 0, 14)).toBe("0506abcdef1234");
    expect([...buffer.subarray(14)]).toEqual([1, 2, 3]);
  });

  it("pads short header fields with spaces", () => {
    const { buffer } = encodeFrame("51", "req", new Uint8Array(0));
    expect(buffer.toString("latin1")).toBe("51  req       ");
  });

  it("truncates long header fields", () => {
    const { buffer } = encodeFrame("05060", "abcdefghijklmnop", new Uint8Array(0));
    expect(buffer.toString("latin1")).toBe("0506abcdefghij");
  });

  it("rejects non-ASCII header characters", () => {
    expect(() => encodeFrame("0506", "réq", new Uint8Array(0))).toThrow(InvalidFrameError);
  });

  it("splits back into the fields it was built from", () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 4, maxLength: 4 }),
        fc.string({ minLength: 10, maxLength: 10 }),
        fc.uint8Array({ maxLength: 256 }),
        (actionId, requestId, body) => {
          const frame = splitFrame(encodeFrame(actionId, requestId, body).buffer);
          expect(frame.actionId).toBe(actionId);
          expect(frame.requestId).toBe(requestId);
          expect(Buffer.compare(frame.body, Buffer.from(body))).toBe(0);
        }
      )
    );
  });
});

describe("splitFrame", () => {
  it("rejects frames shorter than the header", () => {
    expect(() => splitFrame(Buffer.from("0506abc"))).toThrow(InvalidFrameError);
  });
});

describe("classifyMessage", () => {
  it.each([
    [0, MessageClass.ADD_DATA_STATUS],
    [12, MessageClass.ADD_DATA_STATUS],
    [13, MessageClass.SUBSCRIBE_STATUS],
    [14, MessageClass.ADD_DATA_STATUS],
    [60, MessageClass.ADD_DATA_STATUS],
    [61, MessageClass.RESULT_CHUNK],
    [4096, MessageClass.RESULT_CHUNK],
  ])("classifies a %i byte message as %s", (length, expected) => {
    expect(classifyMessage(new Uint8Array(length))).toBe(expected);
  });

  it("depends on length only", () => {
    fc.assert(
      fc.property(fc.uint8Array({ maxLength: 200 }), (message) => {
        const expected =
          message.length === 13
            ? MessageClass.SUBSCRIBE_STATUS
            : message.length <= 60
              ? MessageClass.ADD_DATA_STATUS
              : MessageClass.RESULT_CHUNK;
        expect(classifyMessage(message)).toBe(expected);
      })
    );
  });
});

describe("generateRequestId", () => {
  it("returns 10 hex characters", () => {
    expect(generateRequestId()).toMatch(/^[0-9a-f]{10}$/);
  });

  it("differs between calls", () => {
    expect(generateRequestId()).not.toBe(generateRequestId());
  });
});

describe("inbound readers", () => {
  const message = Buffer.from('conn000001400{"Code":"MEASUREMENT_CLOSED"}', "latin1");

  it("reads the connection id", () => {
    expect(readConnectionId(message)).toBe("conn000001");
  });

  it("reads the status", () => {
    expect(readStatusCode(message)).toBe("400");
    expect(readStatusCode(Buffer.from("XXXXXXXXXX404"))).toBe("404");
  });

  it("reads the body after the 13-byte header", () => {
    expect(readBody(message).toString("utf8")).toBe('{"Code":"MEASUREMENT_CLOSED"}');
    expect(readBody(Buffer.from("XXXXXXXXXX200")).length).toBe(0);
  });

  it("reads the raw status field without checking it", () => {
    expect(readStatusField(Buffer.from("XXXXXXXXXXERR"))).toBe("ERR");
    expect(readStatusField(message)).toBe("400");
  });

  it("rejects a status that is not three digits", () => {
    expect(() => readStatusCode(Buffer.from("conn000001OK!"))).toThrow(InvalidFrameError);
    expect(() => readStatusCode(Buffer.from("conn00000120"))).toThrow(InvalidFrameError);
  });
});
