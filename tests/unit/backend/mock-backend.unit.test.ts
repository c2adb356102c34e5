import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { createTestBackend } from "../../helpers/backend";
import { MockBackend } from "../../../src/backend/mock-backend";
import { SqliteRecordStore } from "../../../src/store/sqlite-store";
import type { MockResponseRecord } from "../../../src/store/types";
import { ConfigurationError, NoMatchError } from "../../../src/errors";
import type { LogEvent } from "../../../src/logging/event-logger";

describe("backend", () => {
  describe("mock-backend", () => {
    let backend: MockBackend;
    let events: LogEvent[];

    beforeEach(async () => {
      const created = await createTestBackend();
      backend = created.backend;
      events = created.eventLogger.events;
      await backend.createScenario({ name: "happy", provider: "plaid" });
      await backend.createScenario({ name: "error", provider: "plaid" });
    });

    afterEach(async () => {
      await backend.close();
    });

    it("should reject every request while no scenario is active", async () => {
      await backend.addMock("happy", { method: "GET", pathPattern: "{*}" }, { statusCode: 200, body: "" });

      await expect(backend.get("/accounts/42")).rejects.toThrow("No mock found for GET /accounts/42");
      await expect(backend.get("/accounts/42")).rejects.toBeInstanceOf(NoMatchError);
    });

    it("should answer from the active scenario with parsed headers", async () => {
      await backend.addMock(
        "happy",
        { method: "GET", pathPattern: "/accounts/{id}" },
        { statusCode: 200, headers: '{"Content-Type":"application/json"}', body: '{"balance":100}' }
      );
      await backend.activateScenario("happy");

      const response = await backend.get("/accounts/42");

      expect(response).toEqual({
        status: 200,
        headers: { "Content-Type": "application/json" },
        body: '{"balance":100}',
      });
    });

    it("should return an empty header map when none are stored", async () => {
      await backend.addMock("happy", { method: "DELETE", pathPattern: "/items/{id}" }, { statusCode: 204, body: "" });
      await backend.activateScenario("happy");

      expect(await backend.delete("/items/7")).toEqual({ status: 204, headers: {}, body: "" });
    });

    it("should match JSON bodies sent through the verb helpers", async () => {
      await backend.addMock(
        "happy",
        { method: "POST", pathPattern: "/item/public_token/exchange", bodyPattern: '{"public_token":"*"}' },
        { statusCode: 200, body: '{"access_token":"access-test"}' }
      );
      await backend.activateScenario("happy");

      const response = await backend.post("/item/public_token/exchange", { public_token: "public-test" });
      expect(response.body).toBe('{"access_token":"access-test"}');

      await expect(backend.post("/item/public_token/exchange", { other: 1 })).rejects.toBeInstanceOf(NoMatchError);
    });

    it("should count matches per activation and persist lifetime totals", async () => {
      const first = await backend.addMock("happy", { method: "GET", pathPattern: "/a" }, { statusCode: 200, body: "a" });
      const second = await backend.addMock("happy", { method: "GET", pathPattern: "/b" }, { statusCode: 200, body: "b" });
      await backend.activateScenario("happy");

      await backend.get("/a");
      await backend.get("/a");

      expect(backend.matchCount(first.request.id)).toBe(2);
      expect(backend.matchCount(second.request.id)).toBe(0);

      await backend.activateScenario("happy");
      expect(backend.matchCount(first.request.id)).toBe(0);

      const [stored] = await backend.listMocks("happy");
      expect(stored.request.timesMatched).toBe(2);
    });

    it("should not count a delayed match once the scenario has switched", async () => {
      const pair = await backend.addMock(
        "happy",
        { method: "GET", pathPattern: "/slow" },
        { statusCode: 200, body: "late", delayMs: 30 }
      );
      await backend.activateScenario("happy");

      const pending = backend.get("/slow");
      await backend.activateScenario("error");
      const response = await pending;

      expect(response.body).toBe("late");
      expect(backend.activeScenario()).toBe("error");
      expect(backend.matchCount(pair.request.id)).toBe(0);
    });

    it("should wait out the configured delay", async () => {
      await backend.addMock("happy", { method: "GET", pathPattern: "/slow" }, { statusCode: 200, body: "", delayMs: 25 });
      await backend.activateScenario("happy");

      const started = Date.now();
      await backend.get("/slow");

      expect(Date.now() - started).toBeGreaterThanOrEqual(20);
    });

    it("should reject broken mocks at registration without storing them", async () => {
      await expect(
        backend.addMock("happy", { method: "GET", pathPattern: "/a/(" }, { statusCode: 200, body: "" })
      ).rejects.toBeInstanceOf(ConfigurationError);
      await expect(
        backend.addMock("happy", { method: "GET", pathPattern: "/a" }, { statusCode: 99, body: "" })
      ).rejects.toThrow("Status code 99 must be an integer between 100 and 599");
      await expect(
        backend.addMock("happy", { method: "GET", pathPattern: "/a" }, { statusCode: 200, headers: "nope", body: "" })
      ).rejects.toBeInstanceOf(ConfigurationError);
      await expect(
        backend.addMock("happy", { method: "GET", pathPattern: "/a" }, { statusCode: 200, body: "", delayMs: -1 })
      ).rejects.toThrow("delayMs must be >= 0");
      await expect(
        backend.addMock("happy", { method: "GET", pathPattern: "/a" }, { statusCode: 200, body: "", delayMs: 2_147_483_648 })
      ).rejects.toThrow("delayMs must be <= 2147483647");

      expect(await backend.listMocks("happy")).toEqual([]);
    });

    it("should refuse to activate an unknown scenario", async () => {
      await backend.activateScenario("happy");

      await expect(backend.activateScenario("missing")).rejects.toThrow("Scenario not found: missing");
      expect(backend.activeScenario()).toBe("happy");
    });

    it("should flag the active scenario in the store", async () => {
      await backend.activateScenario("happy");
      expect((await backend.getScenario("happy"))?.isActive).toBe(true);

      await backend.deactivateScenario();
      expect((await backend.getScenario("happy"))?.isActive).toBe(false);
      expect(backend.activeScenario()).toBeUndefined();
    });

    it("should apply a deactivation issued before a pending activation settles", async () => {
      const activated = backend.activateScenario("happy");
      await backend.deactivateScenario();
      await activated;

      expect(backend.activeScenario()).toBeUndefined();
      expect((await backend.getScenario("happy"))?.isActive).toBe(false);
    });

    it("should not reactivate a scenario reset while its activation was pending", async () => {
      const activated = backend.activateScenario("happy");
      const reset = backend.reset();
      await Promise.all([activated, reset]);

      expect(backend.activeScenario()).toBeUndefined();
      expect(await backend.listScenarios()).toEqual([]);
    });

    it("should deactivate a deleted active scenario", async () => {
      await backend.activateScenario("happy");

      await backend.deleteScenario("happy");

      expect(backend.activeScenario()).toBeUndefined();
      expect((await backend.listScenarios()).map((scenario) => scenario.name)).toEqual(["error"]);
    });

    it("should drop all state on reset", async () => {
      await backend.addMock("happy", { method: "GET", pathPattern: "{*}" }, { statusCode: 200, body: "" });
      await backend.activateScenario("happy");

      await backend.reset();

      expect(backend.activeScenario()).toBeUndefined();
      expect(await backend.listScenarios()).toEqual([]);
      await expect(backend.get("/anything")).rejects.toBeInstanceOf(NoMatchError);
    });

    it("should notify scenario changes", async () => {
      const changes: Array<string | undefined> = [];
      backend.onScenarioChange((scenario) => changes.push(scenario));

      await backend.activateScenario("happy");
      await backend.deactivateScenario();

      expect(changes).toEqual(["happy", undefined]);
    });

    it("should leave counters untouched when stored headers cannot be parsed", async () => {
      class CorruptHeaderStore extends SqliteRecordStore {
        async findMockResponse(requestId: number): Promise<MockResponseRecord | undefined> {
          const response = await super.findMockResponse(requestId);
          return response && { ...response, headers: "nope" };
        }
      }
      const corrupt = await MockBackend.create({ store: new CorruptHeaderStore() });
      await corrupt.createScenario({ name: "happy", provider: "plaid" });
      const pair = await corrupt.addMock("happy", { method: "GET", pathPattern: "/a" }, { statusCode: 200, body: "" });
      await corrupt.activateScenario("happy");

      await expect(corrupt.get("/a")).rejects.toBeInstanceOf(ConfigurationError);

      expect(corrupt.matchCount(pair.request.id)).toBe(0);
      expect((await corrupt.listMocks("happy"))[0]?.request.timesMatched).toBe(0);
      await corrupt.close();
    });

    it("should log the evaluation trail of a request", async () => {
      const miss = await backend.addMock("happy", { method: "GET", pathPattern: "/b" }, { statusCode: 200, body: "" });
      const hit = await backend.addMock("happy", { method: "GET", pathPattern: "/a" }, { statusCode: 202, body: "" });
      await backend.activateScenario("happy");
      events.length = 0;

      await backend.get("/a", { "X-Trace": "1" });

      expect(events).toEqual([
        {
          event: "mock-evaluated",
          scenario: "happy",
          requestId: miss.request.id,
          sequenceOrder: 1,
          request: { method: "GET", url: "/a", headers: ["x-trace"] },
          result: "not-matched",
          reason: "path mismatch",
        },
        {
          event: "mock-evaluated",
          scenario: "happy",
          requestId: hit.request.id,
          sequenceOrder: 2,
          request: { method: "GET", url: "/a", headers: ["x-trace"] },
          result: "matched",
          reason: undefined,
        },
        { event: "mock-matched", scenario: "happy", requestId: hit.request.id, delayMs: undefined },
        { event: "execution-complete", source: "mock", status: 202 },
      ]);
    });

    it("should log a miss with the active scenario", async () => {
      await backend.activateScenario("error");
      events.length = 0;

      await expect(backend.get("/unknown")).rejects.toBeInstanceOf(NoMatchError);

      expect(events).toEqual([
        { event: "no-match", method: "GET", url: "/unknown", activeScenario: "error" },
        { event: "execution-complete", source: "no-match" },
      ]);
    });
  });
});
