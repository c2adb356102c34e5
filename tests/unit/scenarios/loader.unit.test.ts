import { describe, it, expect, beforeEach } from "vitest";
import { loadFs, resetFs } from "../../helpers/memfs";
import { loadScenarios, ScenarioValidationError } from "../../../src/scenarios/loader";
import { createRecordingEventLogger } from "../../../src/logging/event-logger";

const file = (name: string, path = "/a"): string =>
  [
    `scenario: ${name}`,
    "provider: mx",
    "mocks:",
    "  - request:",
    "      method: GET",
    `      path: ${path}`,
    "    respond:",
    "      status: 200",
  ].join("\n");

describe("scenarios", () => {
  describe("loader", () => {
    beforeEach(() => {
      resetFs();
    });

    it("should load yaml files recursively in sorted order", async () => {
      loadFs({
        "/scenarios/b.yaml": file("second"),
        "/scenarios/a.yml": file("first"),
        "/scenarios/nested/c.yaml": file("third"),
        "/scenarios/notes.txt": "ignored",
      });

      const scenarios = await loadScenarios("/scenarios");

      expect(scenarios.map((scenario) => scenario.scenario)).toEqual(["first", "second", "third"]);
      expect(scenarios[2].sourceDir).toBe("/scenarios/nested");
      expect(scenarios[0].sourcePath).toBe("/scenarios/a.yml");
    });

    it("should return nothing without a source directory", async () => {
      const eventLogger = createRecordingEventLogger();

      expect(await loadScenarios(undefined, eventLogger)).toEqual([]);
      expect(eventLogger.events).toEqual([{ event: "scenarios-discovered", scenarios: [] }]);
    });

    it("should fail the whole load on any invalid file", async () => {
      loadFs({
        "/scenarios/good.yaml": file("good"),
        "/scenarios/bad.yaml": file("bad", "no-slash"),
      });
      const eventLogger = createRecordingEventLogger();

      const error = await loadScenarios("/scenarios", eventLogger).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(ScenarioValidationError);
      expect(error instanceof ScenarioValidationError ? error.errors.map((entry) => entry.path) : []).toEqual([
        "mocks[0].request.path",
      ]);
      expect(eventLogger.events.at(-1)).toEqual({ event: "validation-summary", errors: 1, warnings: 0 });
    });

    it("should reject the same scenario name in two files", async () => {
      loadFs({
        "/scenarios/one.yaml": file("twin"),
        "/scenarios/two.yaml": file("twin"),
      });

      await expect(loadScenarios("/scenarios")).rejects.toThrow('Duplicate scenario name "twin" found in /scenarios/one.yaml');
    });
  });
});
