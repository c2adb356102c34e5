import { describe, it, expect } from "vitest";
import { PassThrough } from "node:stream";
import { createEventLogger, createRecordingEventLogger, stableStringify } from "../../../src/logging/event-logger";

const capture = () => {
  const stream = new PassThrough();
  const state = { output: "" };
  stream.on("data", (chunk: Buffer) => {
    state.output += chunk.toString("utf-8");
  });
  return { stream, state };
};

describe("logging", () => {
  describe("event-logger", () => {
    it("should emit stable JSONL with sorted keys", () => {
      const { stream, state } = capture();
      const logger = createEventLogger({ mode: "ci", stream, format: "jsonl" });

      logger.emitEvent({
        event: "no-match",
        url: "/accounts",
        method: "GET",
        activeScenario: "plaid_happy_path",
      });

      expect(state.output).toBe(
        '{"activeScenario":"plaid_happy_path","event":"no-match","method":"GET","url":"/accounts"}\n'
      );
    });

    it("should print pretty blocks without colour in ci mode", () => {
      const { stream, state } = capture();
      const logger = createEventLogger({ mode: "ci", stream, format: "pretty" });

      logger.emitEvent({ event: "scenario-deactivated" });

      expect(state.output).toBe("▶ Scenario deactivated\n ○ previous=none\n");
    });

    it("should print a failed scenario switch", () => {
      const { stream, state } = capture();
      const logger = createEventLogger({ mode: "ci", stream, format: "pretty" });

      logger.emitEvent({ event: "scenario-switch-failed", scenario: "missing", message: "Scenario not found: missing" });

      expect(state.output).toBe(
        "✖ Scenario switch failed\n ○ scenario=missing\n ○ message=Scenario not found: missing\n"
      );
    });

    it("should forward events to subscribers", () => {
      const { stream } = capture();
      const logger = createEventLogger({ mode: "cli", stream });
      const seen: string[] = [];
      logger.onEvent((event) => seen.push(event.event));

      logger.emitEvent({ event: "store-reset" });

      expect(seen).toEqual(["store-reset"]);
    });

    it("should record events in memory", () => {
      const logger = createRecordingEventLogger();

      logger.emitEvent({ event: "scenario-activated", scenario: "happy" });

      expect(logger.events).toEqual([{ event: "scenario-activated", scenario: "happy" }]);
    });

    it("should drop undefined fields when stringifying", () => {
      expect(stableStringify({ b: 1, a: undefined, c: [undefined, { z: 1, y: 2 }] })).toBe(
        '{"b":1,"c":[null,{"y":2,"z":1}]}'
      );
    });
  });
});
