import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import { AgentWireError, InvalidOptionsError } from "../src/errors.js";
import { connectHarness, createStartedSession, type ClientHarness } from "./helpers/harness.js";
import { MockRpcFailure } from "./helpers/mockServer.js";

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

describe("client metadata requests", () => {
  let harness: ClientHarness | null = null;

  afterEach(async () => {
    await harness?.client.forceStop();
    harness = null;
  });

  async function connect(): Promise<ClientHarness> {
    harness = await connectHarness();
    return harness;
  }

  it("reads the server and auth status", async () => {
    const { client } = await connect();

    expect(await client.getStatus()).to.deep.equal({ version: "0.0.0-mock", protocolVersion: 2 });
    expect(await client.getAuthStatus()).to.deep.equal({ isAuthenticated: true, authType: "token", login: "tester" });
  });

  it("caches the model list after the first answer", async () => {
    const { client, server } = await connect();

    const [first, second] = await Promise.all([client.listModels(), client.listModels()]);
    first.pop();
    const third = await client.listModels();

    expect(second).to.deep.equal([{ id: "mock-model", name: "Mock Model", capabilities: { vision: false } }]);
    expect(third).to.deep.equal(second);
    expect(server.requestsFor("models.list")).to.have.length(1);
  });

  it("does not cache a failed model list", async () => {
    const { client, server } = await connect();
    let calls = 0;
    server.override("models.list", () => {
      calls += 1;
      if (calls === 1) {
        throw new MockRpcFailure(-32000, "not signed in");
      }
      return { models: [{ id: "late-model", name: "Late Model" }] };
    });

    expect(await rejection(client.listModels())).to.have.property("message", "not signed in");
    expect(await client.listModels()).to.deep.equal([{ id: "late-model", name: "Late Model" }]);
    expect(calls).to.equal(2);
  });

  it("lists tools, optionally for one model", async () => {
    const { client, server } = await connect();

    const tools = await client.listTools("large-model");

    expect(tools).to.deep.equal([{ name: "shell", description: "Runs commands" }]);
    expect(server.requestsFor("tools.list")[0]?.params).to.deep.equal({ model: "large-model" });
  });

  it("lists persisted sessions with an optional filter", async () => {
    const { client, server } = await connect();
    const session = await createStartedSession(client);

    const sessions = await client.listSessions({ cwd: "/repo" });

    expect(sessions).to.deep.equal([
      {
        sessionId: session.sessionId,
        startTime: "2026-01-01T00:00:00.000Z",
        modifiedTime: "2026-01-01T00:00:00.000Z",
        isRemote: false,
      },
    ]);
    expect(server.requestsFor("session.list")[0]?.params).to.deep.equal({ filter: { cwd: "/repo" } });
  });

  it("deletes a session and forgets it locally", async () => {
    const { client, server } = await connect();
    const session = await createStartedSession(client);

    await client.deleteSession(session.sessionId);

    expect(client.sessionIds).to.deep.equal([]);
    expect(session.isDestroyed).to.equal(true);
    expect(await client.listSessions()).to.deep.equal([]);
    expect(server.requestsFor("session.delete")[0]?.params).to.deep.equal({ sessionId: session.sessionId });
  });

  it("reports a refused delete with the server's reason", async () => {
    const { client, server } = await connect();
    server.override("session.delete", () => ({ success: false, error: "session is locked" }));

    const error = await rejection(client.deleteSession("session-9"));

    expect(error).to.be.instanceOf(AgentWireError);
    expect(error).to.include({ code: "E-SESSION-DELETE", message: "Failed to delete session session-9: session is locked" });
  });

  it("reads the last and foreground session ids", async () => {
    const { client, server } = await connect();

    expect(await client.getLastSessionId()).to.equal(null);
    const session = await createStartedSession(client);
    expect(await client.getLastSessionId()).to.equal(session.sessionId);
    expect(await client.getForegroundSessionId()).to.equal(null);

    await client.setForegroundSessionId(session.sessionId);
    expect(server.requestsFor("session.setForeground")[0]?.params).to.deep.equal({ sessionId: session.sessionId });
  });

  it("reports a refused foreground switch", async () => {
    const { client, server } = await connect();
    server.override("session.setForeground", () => ({ success: false }));

    const error = await rejection(client.setForegroundSessionId("session-3"));

    expect(error).to.include({
      code: "E-SESSION-FOREGROUND",
      message: "Failed to set foreground session session-3: unknown error",
    });
  });

  it("resumes a session with the resume-only parameters", async () => {
    const { client, server } = await connect();

    const session = await client.resumeSession("saved-7", { model: "large-model", disableResume: true });

    expect(session.sessionId).to.equal("saved-7");
    expect(session.workspacePath).to.equal("/workspaces/saved-7");
    expect(server.requestsFor("session.resume")[0]?.params).to.deep.equal({
      sessionId: "saved-7",
      model: "large-model",
      requestPermission: true,
      requestUserInput: false,
      hooks: false,
      disableResume: true,
      envValueMode: "direct",
    });
  });

  it("rejects an invalid session config before contacting the server", async () => {
    const { client, server } = await connect();

    const error = await rejection(client.createSession({ provider: { baseUrl: "http://localhost:8080" } }));

    expect(error).to.be.instanceOf(InvalidOptionsError);
    expect(error).to.have.property("message", "Invalid session config: model: model is required when provider is set");
    expect(server.requestsFor("session.create")).to.deep.equal([]);
  });

  it("refuses to open the same session id twice", async () => {
    const { client } = await connect();
    await client.createSession({ sessionId: "fixed-id" });

    const error = await rejection(client.createSession({ sessionId: "fixed-id" }));

    expect(error).to.be.instanceOf(InvalidOptionsError);
    expect(error).to.have.property(
      "message",
      "Invalid session config: sessionId: session fixed-id is already open on this client",
    );
  });
});
