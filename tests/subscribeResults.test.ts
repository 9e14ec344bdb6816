import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import protobuf from "protobufjs";
import { SocketTransport } from "../packages/transport/src/connection/socketTransport.js";
import { createExchange, type Exchange } from "../packages/client/src/flows/exchange.js";
import { subscribeResults } from "../packages/client/src/flows/subscribeResults.js";
import { uploadChunk } from "../packages/client/src/flows/uploadChunk.js";
import { MeasurementCursor } from "../packages/client/src/measurement/cursor.js";
import { Logger } from "../packages/client/src/observability/logger.js";
import { DEFAULT_PROTO_PATH, ProtoBodySerializer } from "../packages/protocol/src/body.js";
import { ActionId } from "../packages/protocol/src/constants.js";
import {
  InvalidQuotaError,
  SubscriptionRejectedError,
} from "../packages/protocol/src/errors.js";
import {
  FakeApiServer,
  addDataStatus,
  payloadOf,
  resultChunk,
  subscribeStatus,
} from "./helpers/fakeApiServer.js";

const subscribeRequestType = protobuf
  .loadSync(DEFAULT_PROTO_PATH)
  .lookupType("dfxapi.measurements.SubscribeResultsRequest");

describe("subscribeResults", () => {
  let server: FakeApiServer;
  let transport: SocketTransport;
  let exchange: Exchange;

  beforeEach(async () => {
    server = await FakeApiServer.start();
    transport = new SocketTransport({ url: server.url, token: "test-token" });
    await transport.connect();
    exchange = createExchange(transport, { logger: new Logger(false) });
  });

  afterEach(async () => {
    transport.close();
    await server.stop();
  });

  function serveResults(count: number): void {
    server.respondWith((frame) =>
      frame.actionId === ActionId.SUBSCRIBE_RESULTS
        ? [
            subscribeStatus("200"),
            ...Array.from({ length: count }, (_, i) => resultChunk(payloadOf(64, i))),
          ]
        : [addDataStatus("200")]
    );
  }

  it("delivers exactly the allocated chunks", async () => {
    serveResults(4);
    const cursor = new MeasurementCursor(4, 8);
    const received: Array<[number, Buffer]> = [];

    const outcome = await subscribeResults(exchange, {
      measurementId: "m-1",
      startingChunkIndex: 0,
      cursor,
      sink: (payload, index) => {
        received.push([index, payload]);
      },
    });

    expect(outcome).toEqual({ done: true, chunksDelivered: 4 });
    expect(cursor.chunksRemaining).toBe(0);
    expect(received.map(([index]) => index)).toEqual([0, 1, 2, 3]);
    received.forEach(([index, payload]) => {
      expect(payload).toEqual(payloadOf(64, index));
    });
  });

  it("names the measurement and request id in its frame", async () => {
    serveResults(1);

    await subscribeResults(exchange, {
      measurementId: "m-7",
      startingChunkIndex: 0,
      cursor: new MeasurementCursor(1, 8),
      sink: () => undefined,
    });

    const frame = server.frames[0];
    const body = subscribeRequestType.toObject(subscribeRequestType.decode(frame.body));
    expect(frame.actionId).toBe("0510");
    expect(body).toEqual({ Params: { ID: "m-7" }, RequestID: frame.requestId });
  });

  it("stops at one measurement's ceiling and numbers from the starting index", async () => {
    serveResults(3);
    const cursor = new MeasurementCursor(5, 3);
    const indexes: number[] = [];

    const outcome = await subscribeResults(exchange, {
      measurementId: "m-1",
      startingChunkIndex: 8,
      cursor,
      sink: async (_payload, index) => {
        indexes.push(index);
      },
    });

    expect(outcome).toEqual({ done: false, chunksDelivered: 3 });
    expect(cursor.chunksRemaining).toBe(2);
    expect(indexes).toEqual([8, 9, 10]);
  });

  it("throws when the server refuses the subscription", async () => {
    server.respondWith(() => [Buffer.from("XXXXXXXXXX404")]);
    const sink = vi.fn();

    const pending = subscribeResults(exchange, {
      measurementId: "m-1",
      startingChunkIndex: 0,
      cursor: new MeasurementCursor(4, 8),
      sink,
    });

    await expect(pending).rejects.toBeInstanceOf(SubscriptionRejectedError);
    await expect(pending).rejects.toMatchObject({ status: "404", measurementId: "m-1" });
    expect(sink).not.toHaveBeenCalled();
  });

  it("treats a non-numeric status as a refusal", async () => {
    server.respondWith(() => [Buffer.from("XXXXXXXXXXERR")]);

    const pending = subscribeResults(exchange, {
      measurementId: "m-1",
      startingChunkIndex: 0,
      cursor: new MeasurementCursor(4, 8),
      sink: () => undefined,
    });

    await expect(pending).rejects.toBeInstanceOf(SubscriptionRejectedError);
    await expect(pending).rejects.toMatchObject({ status: "ERR" });
  });

  it("reports a refusal even when cancelled after sending", async () => {
    const controller = new AbortController();
    const proto = new ProtoBodySerializer();
    const cancelling = createExchange(transport, {
      logger: new Logger(false),
      serializer: {
        encodeDataRequest: (request) => proto.encodeDataRequest(request),
        encodeSubscribeRequest: (measurementId, requestId) => {
          controller.abort();
          return proto.encodeSubscribeRequest(measurementId, requestId);
        },
      },
    });
    cancelling.router.ingest(Buffer.from("XXXXXXXXXX404"), transport.connectionId);

    const pending = subscribeResults(
      cancelling,
      {
        measurementId: "m-1",
        startingChunkIndex: 0,
        cursor: new MeasurementCursor(4, 8),
        sink: () => undefined,
      },
      { signal: controller.signal }
    );

    await expect(pending).rejects.toBeInstanceOf(SubscriptionRejectedError);
    await expect(pending).rejects.toMatchObject({ status: "404" });
  });

  it("fails on a negative quota before sending anything", async () => {
    await expect(
      subscribeResults(exchange, {
        measurementId: "m-1",
        startingChunkIndex: 0,
        cursor: new MeasurementCursor(-1, 8),
        sink: () => undefined,
      })
    ).rejects.toBeInstanceOf(InvalidQuotaError);
    expect(server.frames).toHaveLength(0);
  });

  it("sends nothing when nothing is left to allocate", async () => {
    const outcome = await subscribeResults(exchange, {
      measurementId: "m-1",
      startingChunkIndex: 0,
      cursor: new MeasurementCursor(0, 8),
      sink: () => undefined,
    });

    expect(outcome).toEqual({ done: true, chunksDelivered: 0 });
    expect(server.frames).toHaveLength(0);
  });

  it("returns what it has when cancelled", async () => {
    server.respondWith(() => [subscribeStatus("200"), resultChunk(payloadOf(64))]);
    const controller = new AbortController();
    const sink = vi.fn();

    const pending = subscribeResults(
      exchange,
      {
        measurementId: "m-1",
        startingChunkIndex: 0,
        cursor: new MeasurementCursor(4, 8),
        sink,
      },
      { signal: controller.signal }
    );

    await vi.waitFor(() => expect(sink).toHaveBeenCalledTimes(1));
    controller.abort();

    await expect(pending).resolves.toEqual({ done: true, chunksDelivered: 1 });
  });

  it("shares the socket with a concurrent upload", async () => {
    serveResults(2);
    const chunks: number[] = [];

    const [subscription, ack] = await Promise.all([
      subscribeResults(
        exchange,
        {
          measurementId: "m-1",
          startingChunkIndex: 0,
          cursor: new MeasurementCursor(2, 8),
          sink: (_payload, index) => {
            chunks.push(index);
          },
        },
        { pollIntervalMs: 5 }
      ),
      uploadChunk(
        exchange,
        {
          measurementId: "m-1",
          chunkOrder: 0,
          action: "FIRST::PROCESS",
          startTime: 0,
          endTime: 15,
          duration: 15,
          payload: Buffer.from("chunk-bytes"),
        },
        { pollIntervalMs: 5, timeoutMs: 2000 }
      ),
    ]);

    expect(subscription).toEqual({ done: true, chunksDelivered: 2 });
    expect(chunks).toEqual([0, 1]);
    expect(ack.kind).toBe("success");
  });
});
