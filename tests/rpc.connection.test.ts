import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { ConnectionClosedError, RemoteRpcError, RequestTimeoutError, TransportError } from "../src/errors.js";
import { JsonRpcConnection } from "../src/rpc/connection.js";
import { InvalidParamsError } from "../src/rpc/errors.js";
import type { JsonRpcNotification, JsonRpcRequest } from "../src/rpc/messages.js";
import { MemoryChannel } from "./helpers/memoryChannel.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function settle<T>(promise: Promise<T>): Promise<{ value?: T; error?: unknown }> {
  return promise.then(
    (value) => ({ value }),
    (error: unknown) => ({ error }),
  );
}

function setup(defaultTimeoutMs?: number) {
  const channel = new MemoryChannel();
  const logger = new RecordingLogger();
  const connection = new JsonRpcConnection(channel, {
    logger,
    ...(defaultTimeoutMs !== undefined ? { defaultTimeoutMs } : {}),
  });
  return { channel, logger, connection };
}

describe("JsonRpcConnection", () => {
  afterEach(() => {
    sinon.restore();
  });

  it("correlates responses with their requests by id", async () => {
    const { channel, connection } = setup();
    const first = connection.request("models.list", {});
    const second = connection.request("status.get", {});

    expect(channel.written).to.deep.equal([
      { jsonrpc: "2.0", id: 1, method: "models.list", params: {} },
      { jsonrpc: "2.0", id: 2, method: "status.get", params: {} },
    ]);

    channel.deliver({ jsonrpc: "2.0", id: 2, result: { version: "1.0.0" } });
    channel.deliver({ jsonrpc: "2.0", id: 1, result: { models: [] } });

    expect(await first).to.deep.equal({ models: [] });
    expect(await second).to.deep.equal({ version: "1.0.0" });
    expect(connection.pendingCount).to.equal(0);
  });

  it("rejects with RemoteRpcError when the server answers an error", async () => {
    const { channel, connection } = setup();
    const pending = settle(connection.request("session.send", { sessionId: "s-1" }));

    channel.deliver({ jsonrpc: "2.0", id: 1, error: { code: -32001, message: "Unknown session: s-1", data: { hint: "resume" } } });

    const { error } = await pending;
    expect(error).to.be.instanceOf(RemoteRpcError);
    expect(error).to.include({ rpcCode: -32001, method: "session.send", message: "Unknown session: s-1" });
    expect(error).to.have.deep.property("rpcData", { hint: "resume" });
  });

  it("times out a request and ignores its late response", async () => {
    const clock = sinon.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
    const { channel, connection, logger } = setup();
    const pending = settle(connection.request("slow", {}, { timeoutMs: 50 }));

    clock.tick(49);
    expect(connection.pendingCount).to.equal(1);
    clock.tick(1);

    const { error } = await pending;
    expect(error).to.be.instanceOf(RequestTimeoutError);
    expect(error).to.include({ message: 'Request "slow" timed out after 50ms', timeoutMs: 50 });
    expect(connection.pendingCount).to.equal(0);

    channel.deliver({ jsonrpc: "2.0", id: 1, result: {} });
    expect(logger.find("rpc_response_unmatched")).to.have.length(1);
  });

  it("applies the default timeout unless a request opts out with null", async () => {
    const clock = sinon.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
    const { channel, connection } = setup(100);
    const bounded = settle(connection.request("bounded", {}));
    const unbounded = settle(connection.request("unbounded", {}, { timeoutMs: null }));

    clock.tick(10_000);
    expect((await bounded).error).to.be.instanceOf(RequestTimeoutError);
    expect(connection.pendingCount).to.equal(1);

    channel.deliver({ jsonrpc: "2.0", id: 2, result: "late but fine" });
    expect((await unbounded).value).to.equal("late but fine");
  });

  it("rejects every pending request when closed and refuses new ones", async () => {
    const { channel, connection } = setup();
    const closeReasons: string[] = [];
    connection.onClose((reason) => closeReasons.push(reason));
    const pending = settle(connection.request("session.create", {}));

    connection.close();
    connection.close();

    const { error } = await pending;
    expect(error).to.be.instanceOf(ConnectionClosedError);
    expect(error).to.have.property("message", 'Connection closed before "session.create" completed: closed by client');
    expect(channel.disposed).to.equal(true);
    expect(closeReasons).to.deep.equal(["closed by client"]);

    const late = await settle(connection.request("ping", {}));
    expect(late.error).to.be.instanceOf(ConnectionClosedError);
  });

  it("closes itself when the transport goes away", async () => {
    const { channel, connection } = setup();
    const pending = settle(connection.request("ping", {}));

    channel.dispose();

    expect(connection.isClosed).to.equal(true);
    expect((await pending).error).to.have.property("message", 'Connection closed before "ping" completed: transport closed');
  });

  it("turns a failed write into a TransportError", async () => {
    const { channel, connection } = setup();
    channel.failNextWrite = new Error("EPIPE");

    const { error } = await settle(connection.request("ping", {}));

    expect(error).to.be.instanceOf(TransportError);
    expect(error).to.have.property("message", 'Failed to send "ping": EPIPE');
    expect(connection.pendingCount).to.equal(0);
  });

  it("hands inbound requests and notifications to their handlers", () => {
    const { channel, connection } = setup();
    const requests: JsonRpcRequest[] = [];
    const notifications: JsonRpcNotification[] = [];
    connection.onRequest((message) => requests.push(message));
    connection.onNotification((message) => notifications.push(message));

    channel.deliver({ jsonrpc: "2.0", id: "srv-1", method: "tool.call", params: { sessionId: "s" } });
    channel.deliver({ jsonrpc: "2.0", method: "session.event", params: { sessionId: "s" } });

    expect(requests).to.deep.equal([{ jsonrpc: "2.0", id: "srv-1", method: "tool.call", params: { sessionId: "s" } }]);
    expect(notifications).to.deep.equal([{ jsonrpc: "2.0", method: "session.event", params: { sessionId: "s" } }]);
  });

  it("answers a malformed request that carries an id with INVALID_REQUEST", async () => {
    const { channel, connection, logger } = setup();

    channel.deliver({ jsonrpc: "2.0", id: 7, method: 42 });
    await Promise.resolve();

    expect(channel.written).to.deep.equal([
      { jsonrpc: "2.0", id: 7, error: { code: -32600, message: "method: Expected string, received number" } },
    ]);
    expect(logger.find("rpc_frame_invalid")).to.have.length(1);
    expect(connection.isClosed).to.equal(false);
  });

  it("writes results and typed errors for inbound calls", async () => {
    const { channel, connection } = setup();

    await connection.respond("srv-1", undefined);
    await connection.respondError("srv-2", new InvalidParamsError("sessionId: Required"));

    expect(channel.written).to.deep.equal([
      { jsonrpc: "2.0", id: "srv-1", result: null },
      { jsonrpc: "2.0", id: "srv-2", error: { code: -32602, message: "sessionId: Required" } },
    ]);
  });

  it("logs frame decoding errors without closing", () => {
    const { channel, connection, logger } = setup();

    channel.raise(new Error("Header must provide a Content-Length property."));

    expect(logger.find("rpc_frame_error")).to.deep.equal([
      { level: "warn", message: "rpc_frame_error", payload: { message: "Header must provide a Content-Length property." } },
    ]);
    expect(connection.isClosed).to.equal(false);
  });
});
