import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { CallbackBridge } from "../src/bridge/callbacks.js";
import { FAILED_TOOL_TEXT } from "../src/bridge/results.js";
import type { ToolInvocation } from "../src/bridge/types.js";
import { JsonRpcError } from "../src/rpc/errors.js";
import { defineTool } from "../src/tools.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { buildSessionRecord } from "./helpers/records.js";

const DENIAL = { kind: "denied-no-approval-rule-and-could-not-request-from-user" };

function createBridge(toolTimeoutMs: number | null = 1_000) {
  const logger = new RecordingLogger();
  return { logger, bridge: new CallbackBridge({ logger, toolTimeoutMs }) };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the promise to reject");
}

describe("CallbackBridge", () => {
  afterEach(() => {
    sinon.restore();
  });

  describe("tool calls", () => {
    it("invokes the registered handler with the arguments and invocation context", async () => {
      const seen: Array<{ args: unknown; invocation: ToolInvocation }> = [];
      const tool = defineTool("lookup", {
        description: "Looks things up",
        handler: (args, invocation) => {
          seen.push({ args, invocation });
          return "found it";
        },
      });
      const { bridge } = createBridge();
      const record = buildSessionRecord({ sessionId: "session-7", tools: [tool] });

      const result = await bridge.handleToolCall(record, {
        sessionId: "session-7",
        toolCallId: "call-1",
        toolName: "lookup",
        arguments: { query: "weather" },
      });

      expect(result).to.deep.equal({ textResultForLlm: "found it", resultType: "success", toolTelemetry: {} });
      expect(seen).to.deep.equal([
        {
          args: { query: "weather" },
          invocation: { sessionId: "session-7", toolCallId: "call-1", toolName: "lookup", arguments: { query: "weather" } },
        },
      ]);
    });

    it("hides the exception text of a failing handler from the result", async () => {
      const tool = defineTool("explode", {
        description: "Always fails",
        handler: () => {
          throw new Error("boom");
        },
      });
      const { bridge, logger } = createBridge();
      const record = buildSessionRecord({ tools: [tool] });

      const result = await bridge.handleToolCall(record, {
        sessionId: record.sessionId,
        toolCallId: "call-2",
        toolName: "explode",
      });

      expect(result).to.deep.equal({
        textResultForLlm: FAILED_TOOL_TEXT,
        resultType: "failure",
        error: "tool execution failed",
        toolTelemetry: {},
      });
      expect(JSON.stringify(result)).to.not.contain("boom");
      const [entry] = logger.find("tool_handler_failed");
      expect(entry?.level).to.equal("error");
      expect(entry?.payload).to.have.property("tool", "explode");
    });

    it("answers unsupported for unknown tools", async () => {
      const { bridge } = createBridge();
      const result = await bridge.handleToolCall(buildSessionRecord(), {
        sessionId: "session-test",
        toolCallId: "call-3",
        toolName: "missing",
      });
      expect(result.resultType).to.equal("failure");
      expect(result.error).to.equal("tool 'missing' not supported");
    });

    it("fails a tool that outlives the tool timeout", async () => {
      const clock = sinon.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
      const tool = defineTool("hang", { description: "Never answers", handler: () => new Promise(() => undefined) });
      const { bridge, logger } = createBridge(500);

      const pending = bridge.handleToolCall(buildSessionRecord({ tools: [tool] }), {
        sessionId: "session-test",
        toolCallId: "call-4",
        toolName: "hang",
      });
      await clock.tickAsync(500);

      expect((await pending).error).to.equal("tool execution failed");
      expect(logger.find("tool_handler_failed")).to.have.length(1);
    });
  });

  describe("permission requests", () => {
    it("denies when no handler is registered", async () => {
      const { bridge } = createBridge();
      const result = await bridge.handlePermissionRequest(buildSessionRecord(), {
        sessionId: "session-test",
        permissionRequest: { kind: "shell" },
      });
      expect(result).to.deep.equal(DENIAL);
    });

    it("returns the handler decision", async () => {
      const handler = sinon.stub().resolves({ kind: "approved" });
      const { bridge } = createBridge();
      const record = buildSessionRecord({ sessionId: "session-9", permissionHandler: handler });

      const result = await bridge.handlePermissionRequest(record, {
        sessionId: "session-9",
        permissionRequest: { kind: "write", toolCallId: "call-5" },
      });

      expect(result).to.deep.equal({ kind: "approved" });
      sinon.assert.calledOnceWithExactly(handler, { kind: "write", toolCallId: "call-5" }, { sessionId: "session-9" });
    });

    it("falls back to the denial when the handler throws or answers garbage", async () => {
      const { bridge, logger } = createBridge();
      const throwing = buildSessionRecord({
        permissionHandler: () => {
          throw new Error("policy store offline");
        },
      });
      const garbage = buildSessionRecord({ permissionHandler: () => ({ kind: "perhaps" }) });

      expect(await bridge.handlePermissionRequest(throwing, { sessionId: "session-test", permissionRequest: {} })).to.deep.equal(DENIAL);
      expect(await bridge.handlePermissionRequest(garbage, { sessionId: "session-test", permissionRequest: {} })).to.deep.equal(DENIAL);
      expect(logger.find("permission_handler_failed")).to.have.length(1);
      expect(logger.find("permission_result_invalid")).to.have.length(1);
    });
  });

  describe("user input requests", () => {
    const params = { sessionId: "session-test", question: "Which colour?", choices: ["red", "blue"] };

    it("answers with the handler response", async () => {
      const handler = sinon.stub().returns({ answer: "blue", wasFreeform: false });
      const { bridge } = createBridge();

      const result = await bridge.handleUserInputRequest(buildSessionRecord({ userInputHandler: handler }), params);

      expect(result).to.deep.equal({ answer: "blue", wasFreeform: false });
      sinon.assert.calledOnceWithExactly(
        handler,
        { question: "Which colour?", choices: ["red", "blue"] },
        { sessionId: "session-test" },
      );
    });

    it("raises a protocol error when no handler is registered", async () => {
      const { bridge } = createBridge();
      const error = await rejection(bridge.handleUserInputRequest(buildSessionRecord(), params));
      expect(error).to.be.instanceOf(JsonRpcError);
      expect(error).to.include({ code: -32001, message: "User input requested but no handler registered" });
    });

    it("raises a protocol error when the handler fails", async () => {
      const { bridge, logger } = createBridge();
      const record = buildSessionRecord({ userInputHandler: () => Promise.reject(new Error("terminal closed")) });

      const error = await rejection(bridge.handleUserInputRequest(record, params));

      expect(error).to.include({ code: -32001, message: "User input handler failed" });
      expect(logger.find("user_input_handler_failed")).to.have.length(1);
    });

    it("raises a protocol error for an empty answer", async () => {
      const { bridge } = createBridge();
      const record = buildSessionRecord({ userInputHandler: () => ({ answer: "" }) });

      const error = await rejection(bridge.handleUserInputRequest(record, params));

      expect(error).to.include({ code: -32001, message: "User input handler returned invalid answer" });
    });
  });

  describe("hooks", () => {
    it("routes the hook type to its handler and wraps the output", async () => {
      const onPreToolUse = sinon.stub().resolves({ permissionDecision: "allow" });
      const { bridge } = createBridge();
      const record = buildSessionRecord({ hooks: { onPreToolUse } });

      const result = await bridge.handleHookInvoke(record, {
        sessionId: "session-test",
        hookType: "preToolUse",
        input: { toolName: "shell" },
      });

      expect(result).to.deep.equal({ output: { permissionDecision: "allow" } });
      sinon.assert.calledOnceWithExactly(onPreToolUse, { toolName: "shell" }, { sessionId: "session-test" });
    });

    it("answers null output when the handler returns nothing", async () => {
      const { bridge } = createBridge();
      const record = buildSessionRecord({ hooks: { onSessionEnd: () => undefined } });
      expect(await bridge.handleHookInvoke(record, { sessionId: "session-test", hookType: "sessionEnd" })).to.deep.equal({
        output: null,
      });
    });

    it("answers null for unknown hook types and failing handlers", async () => {
      const { bridge, logger } = createBridge();
      const record = buildSessionRecord({
        hooks: {
          onErrorOccurred: () => {
            throw new Error("hook crashed");
          },
        },
      });

      expect(await bridge.handleHookInvoke(record, { sessionId: "session-test", hookType: "somethingNew" })).to.equal(null);
      expect(await bridge.handleHookInvoke(record, { sessionId: "session-test", hookType: "errorOccurred" })).to.equal(null);
      expect(logger.find("hook_handler_failed")).to.have.length(1);
    });
  });
});
