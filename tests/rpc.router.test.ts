import { afterEach, describe, it } from "mocha";
import { expect } from "chai";

import type { SessionLifecycleEvent } from "../src/events/types.js";
import { getInboundCallContext, type InboundCallContext } from "../src/rpc/context.js";
import { defineTool } from "../src/tools.js";
import { connectHarness, waitFor, type ClientHarness } from "./helpers/harness.js";

describe("protocol router", () => {
  let harness: ClientHarness | null = null;

  afterEach(async () => {
    await harness?.client.forceStop();
    harness = null;
  });

  async function connect(options: Parameters<typeof connectHarness>[0] = {}): Promise<ClientHarness> {
    harness = await connectHarness(options);
    return harness;
  }

  describe("server calls", () => {
    it("answers unknown methods with METHOD_NOT_FOUND", async () => {
      const { server } = await connect();
      expect(await server.call("workspace.sync", {})).to.deep.equal({
        error: { code: -32601, message: "Unknown method: workspace.sync" },
      });
    });

    it("answers tool and user-input calls for unknown sessions with -32001", async () => {
      const { server } = await connect();
      expect(
        await server.call("tool.call", { sessionId: "ghost", toolCallId: "c-1", toolName: "shell", arguments: {} }),
      ).to.deep.equal({ error: { code: -32001, message: "Unknown session: ghost" } });
      expect(await server.call("userInput.request", { sessionId: "ghost", question: "Continue?" })).to.deep.equal({
        error: { code: -32001, message: "Unknown session: ghost" },
      });
    });

    it("denies permissions and skips hooks for unknown sessions", async () => {
      const { server } = await connect();
      expect(await server.call("permission.request", { sessionId: "ghost", permissionRequest: { kind: "shell" } })).to.deep.equal({
        result: { result: { kind: "denied-no-approval-rule-and-could-not-request-from-user" } },
      });
      expect(await server.call("hooks.invoke", { sessionId: "ghost", hookType: "preToolUse", input: {} })).to.deep.equal({
        result: null,
      });
    });

    it("answers malformed params with INVALID_PARAMS", async () => {
      const { server } = await connect();
      expect(await server.call("tool.call", { sessionId: "ghost" })).to.deep.equal({
        error: { code: -32602, message: "toolCallId: Required; toolName: Required" },
      });
    });

    it("runs a registered tool and returns its result", async () => {
      const { client, server } = await connect();
      const session = await client.createSession({
        tools: [defineTool("echo", { description: "Echoes", handler: (args) => JSON.stringify(args) })],
      });

      const outcome = await server.call("tool.call", {
        sessionId: session.sessionId,
        toolCallId: "c-2",
        toolName: "echo",
        arguments: { text: "hi" },
      });

      expect(outcome).to.deep.equal({
        result: { result: { textResultForLlm: '{"text":"hi"}', resultType: "success", toolTelemetry: {} } },
      });
    });

    it("accepts the user input aliases", async () => {
      const { client, server } = await connect();
      const session = await client.createSession({ onUserInputRequest: () => ({ answer: "yes" }) });

      for (const method of ["userInput.request", "user-input.request", "ask_user"]) {
        expect(await server.call(method, { sessionId: session.sessionId, question: "Proceed?" })).to.deep.equal({
          result: { answer: "yes", wasFreeform: true },
        });
      }
    });

    it("exposes the inbound call context to callbacks", async () => {
      const { client, server } = await connect();
      const contexts: Array<InboundCallContext | undefined> = [];
      const session = await client.createSession({
        tools: [
          defineTool("whoami", {
            description: "Reports the call context",
            handler: async () => {
              await Promise.resolve();
              contexts.push(getInboundCallContext());
              return "ok";
            },
          }),
        ],
      });

      await server.call("tool.call", { sessionId: session.sessionId, toolCallId: "c-3", toolName: "whoami" });

      expect(contexts).to.deep.equal([{ requestId: "srv-1", method: "tool.call", sessionId: session.sessionId }]);
      expect(getInboundCallContext()).to.equal(undefined);
    });

    it("bounds the number of callbacks running at once", async () => {
      const { client, server } = await connect({ callbackConcurrency: 1 });
      let open: () => void = () => {};
      const gate = new Promise<void>((resolve) => {
        open = resolve;
      });
      const session = await client.createSession({
        tools: [defineTool("wait", { description: "Waits for the gate", handler: () => gate.then(() => "released") })],
      });

      const slow = server.call("tool.call", { sessionId: session.sessionId, toolCallId: "c-4", toolName: "wait" });
      let fastSettled = false;
      const fast = server.call("hooks.invoke", { sessionId: "ghost", hookType: "preToolUse" }).then((outcome) => {
        fastSettled = true;
        return outcome;
      });

      for (let index = 0; index < 20; index += 1) {
        await new Promise<void>((resolve) => setImmediate(resolve));
      }
      expect(fastSettled).to.equal(false);

      open();
      expect((await slow).result).to.deep.equal({
        result: { textResultForLlm: "released", resultType: "success", toolTelemetry: {} },
      });
      expect(await fast).to.deep.equal({ result: null });
    });
  });

  describe("notifications", () => {
    it("queues notifications without session scope in arrival order", async () => {
      const { client, server } = await connect();
      server.notify("server.status", { state: "busy" });
      server.notify("server.status", { state: "idle" });

      const received: unknown[] = [];
      for await (const notification of client.notifications()) {
        received.push(notification);
        if (received.length === 2) {
          break;
        }
      }

      expect(received).to.deep.equal([
        { method: "server.status", params: { state: "busy" } },
        { method: "server.status", params: { state: "idle" } },
      ]);
    });

    it("keeps the queue for the next reader after an early exit", async () => {
      const { client, server } = await connect();
      server.notify("first", {});
      server.notify("second", {});

      for await (const notification of client.notifications()) {
        expect(notification.method).to.equal("first");
        break;
      }
      for await (const notification of client.notifications()) {
        expect(notification.method).to.equal("second");
        break;
      }
    });

    it("drops notifications once the queue is full", async () => {
      const { server, logger } = await connect({ notificationQueueSize: 1 });
      server.notify("kept", {});
      server.notify("dropped", {});

      await waitFor(() => logger.find("notification_dropped").length === 1, "second notification dropped");
      expect(logger.find("notification_dropped")[0]?.payload).to.deep.equal({ method: "dropped", capacity: 1 });
    });

    it("dispatches lifecycle events to matching handlers", async () => {
      const { client, server } = await connect();
      const all: SessionLifecycleEvent[] = [];
      const deleted: SessionLifecycleEvent[] = [];
      const unsubscribe = client.onLifecycleEvent((event) => all.push(event));
      client.onLifecycleEvent("session.deleted", (event) => deleted.push(event));
      client.onLifecycleEvent(() => {
        throw new Error("listener bug");
      });

      server.notify("session.lifecycle", { type: "session.created", sessionId: "s-1" });
      server.notify("session.lifecycle", { type: "session.deleted", sessionId: "s-1", metadata: { reason: "user" } });
      await waitFor(() => all.length === 2, "two lifecycle events");

      unsubscribe();
      server.notify("session.lifecycle", { type: "session.updated", sessionId: "s-1" });
      await waitFor(() => harness?.logger.find("lifecycle_handler_failed").length === 3, "third event dispatched");

      expect(all).to.deep.equal([
        { type: "session.created", sessionId: "s-1" },
        { type: "session.deleted", sessionId: "s-1", metadata: { reason: "user" } },
      ]);
      expect(deleted).to.deep.equal([{ type: "session.deleted", sessionId: "s-1", metadata: { reason: "user" } }]);
    });

    it("drops session events for sessions the client does not know", async () => {
      const { server, logger } = await connect();
      server.emitEvent("stranger", "assistant.message", { content: "hello" });

      await waitFor(() => logger.find("session_event_dropped").length === 1, "event dropped");
      expect(logger.find("session_event_dropped")[0]?.payload).to.deep.equal({
        session_id: "stranger",
        type: "assistant.message",
        reason: "unknown_session",
      });
    });
  });
});
