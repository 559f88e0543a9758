import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import {
  classifyHandlerReturn,
  FAILED_TOOL_TEXT,
  normalizePermissionResult,
  normalizeToolResult,
  normalizeUserInputResponse,
  settleHandler,
  unsupportedToolResult,
} from "../src/bridge/results.js";
import { RequestTimeoutError } from "../src/errors.js";

async function* yields(...items: unknown[]): AsyncGenerator<unknown> {
  for (const item of items) {
    yield item;
  }
}

describe("bridge results", () => {
  afterEach(() => {
    sinon.restore();
  });

  describe("classifyHandlerReturn", () => {
    it("tags plain values, promises and async iterables", () => {
      expect(classifyHandlerReturn("text").kind).to.equal("value");
      expect(classifyHandlerReturn({ answer: "yes" }).kind).to.equal("value");
      expect(classifyHandlerReturn(null).kind).to.equal("value");
      expect(classifyHandlerReturn(Promise.resolve(1)).kind).to.equal("promise");
      expect(classifyHandlerReturn({ then: () => undefined }).kind).to.equal("promise");
      expect(classifyHandlerReturn(yields(1)).kind).to.equal("stream");
    });
  });

  describe("settleHandler", () => {
    it("returns plain values and awaited promises", async () => {
      expect(await settleHandler(() => "plain", 100, "Tool")).to.equal("plain");
      expect(await settleHandler(() => Promise.resolve("later"), 100, "Tool")).to.equal("later");
    });

    it("takes the first item of an async iterable", async () => {
      expect(await settleHandler(() => yields("first", "second"), null, "Tool")).to.equal("first");
      expect(await settleHandler(() => yields(), null, "Tool")).to.equal(undefined);
    });

    it("turns a synchronous throw into a rejection", async () => {
      let caught: unknown;
      try {
        await settleHandler(() => {
          throw new Error("sync failure");
        }, 100, "Tool");
      } catch (error) {
        caught = error;
      }
      expect(caught).to.be.instanceOf(Error).and.have.property("message", "sync failure");
    });

    it("rejects with RequestTimeoutError when a deferred answer is too slow", async () => {
      const clock = sinon.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });
      const outcome = settleHandler(() => new Promise(() => undefined), 250, 'Tool "slow"').then(
        () => null,
        (error: unknown) => error,
      );

      await clock.tickAsync(250);

      const error = await outcome;
      expect(error).to.be.instanceOf(RequestTimeoutError);
      expect(error).to.have.property("message", 'Tool "slow" timed out after 250ms');
    });
  });

  describe("normalizeToolResult", () => {
    it("wraps strings as successes", () => {
      expect(normalizeToolResult("42 files")).to.deep.equal({
        textResultForLlm: "42 files",
        resultType: "success",
        toolTelemetry: {},
      });
    });

    it("reports a missing result as a failure", () => {
      expect(normalizeToolResult(undefined)).to.deep.equal({
        textResultForLlm: "Tool returned no result",
        resultType: "failure",
        error: "tool returned no result",
        toolTelemetry: {},
      });
    });

    it("passes structured results through", () => {
      const result = { textResultForLlm: "denied by policy", resultType: "denied", sessionLog: "policy hit" };
      expect(normalizeToolResult(result)).to.deep.equal(result);
    });

    it("encodes other values as JSON", () => {
      expect(normalizeToolResult({ temperature: 21, unit: "C" })).to.deep.equal({
        textResultForLlm: '{"temperature":21,"unit":"C"}',
        resultType: "success",
        toolTelemetry: {},
      });
      expect(normalizeToolResult(7).textResultForLlm).to.equal("7");
    });

    it("describes unsupported tools without leaking details", () => {
      expect(unsupportedToolResult("deploy")).to.deep.equal({
        textResultForLlm: "Tool 'deploy' is not supported by this client instance.",
        resultType: "failure",
        error: "tool 'deploy' not supported",
        toolTelemetry: {},
      });
      expect(FAILED_TOOL_TEXT).to.equal("Invoking this tool produced an error. Detailed information is not available.");
    });
  });

  describe("normalizePermissionResult", () => {
    it("accepts direct and wrapped decisions", () => {
      expect(normalizePermissionResult({ kind: "approved" })).to.deep.equal({ kind: "approved" });
      expect(normalizePermissionResult({ result: { kind: "denied-by-rules", rules: ["no-shell"] } })).to.deep.equal({
        kind: "denied-by-rules",
        rules: ["no-shell"],
      });
    });

    it("returns null for anything else", () => {
      expect(normalizePermissionResult({ kind: "maybe" })).to.equal(null);
      expect(normalizePermissionResult("approved")).to.equal(null);
      expect(normalizePermissionResult(undefined)).to.equal(null);
    });
  });

  describe("normalizeUserInputResponse", () => {
    it("reads the answer or its response alias and defaults wasFreeform to true", () => {
      expect(normalizeUserInputResponse({ answer: "blue" })).to.deep.equal({ answer: "blue", wasFreeform: true });
      expect(normalizeUserInputResponse({ response: "red", wasFreeform: false })).to.deep.equal({
        answer: "red",
        wasFreeform: false,
      });
    });

    it("rejects empty or malformed answers", () => {
      expect(normalizeUserInputResponse({ answer: "" })).to.equal(null);
      expect(normalizeUserInputResponse({})).to.equal(null);
      expect(normalizeUserInputResponse("blue")).to.equal(null);
      expect(normalizeUserInputResponse({ answer: 3 })).to.equal(null);
    });
  });
});
