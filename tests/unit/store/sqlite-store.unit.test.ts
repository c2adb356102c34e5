import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ConfigurationError, StorageError } from "../../../src/errors";
import { SqliteRecordStore } from "../../../src/store/sqlite-store";

describe("store", () => {
  describe("sqlite-store", () => {
    let store: SqliteRecordStore;

    beforeEach(async () => {
      store = new SqliteRecordStore();
      await store.init();
    });

    afterEach(async () => {
      await store.close();
    });

    const addGet = (scenario: string, pathPattern: string, sequenceOrder?: number) =>
      store.createMock(
        scenario,
        { method: "GET", pathPattern, sequenceOrder },
        { statusCode: 200, body: pathPattern }
      );

    it("should create scenarios inactive and find them by name and id", async () => {
      const created = await store.createScenario({ name: "happy", provider: "plaid", description: "All good" });

      expect(created.isActive).toBe(false);
      expect(created.description).toBe("All good");
      expect((await store.findScenarioByName("happy"))?.id).toBe(created.id);
      expect((await store.findScenarioById(created.id))?.name).toBe("happy");
      expect(await store.findScenarioByName("missing")).toBeUndefined();
    });

    it("should surface a duplicate name as a storage error", async () => {
      await store.createScenario({ name: "happy", provider: "plaid" });

      await expect(store.createScenario({ name: "happy", provider: "mx" })).rejects.toBeInstanceOf(StorageError);
    });

    it("should list scenarios by name", async () => {
      await store.createScenario({ name: "zeta", provider: "mx" });
      await store.createScenario({ name: "alpha", provider: "plaid" });

      const names = (await store.listScenarios()).map((scenario) => scenario.name);
      expect(names).toEqual(["alpha", "zeta"]);
    });

    it("should assign sequence orders after the highest existing one", async () => {
      await store.createScenario({ name: "happy", provider: "plaid" });

      const first = await addGet("happy", "/a");
      const second = await addGet("happy", "/b");
      const explicit = await addGet("happy", "/c", 10);
      const next = await addGet("happy", "/d");

      expect(first.request.sequenceOrder).toBe(1);
      expect(second.request.sequenceOrder).toBe(2);
      expect(explicit.request.sequenceOrder).toBe(10);
      expect(next.request.sequenceOrder).toBe(11);
    });

    it("should store the response beside its request", async () => {
      await store.createScenario({ name: "happy", provider: "plaid" });
      const pair = await store.createMock(
        "happy",
        { method: "POST", pathPattern: "/link", bodyPattern: '{"a":"*"}', headersPattern: '{"X":"1"}' },
        { statusCode: 201, headers: '{"Content-Type":"application/json"}', body: "{}", delayMs: 5 }
      );

      expect(pair.request.timesMatched).toBe(0);
      expect(pair.request.bodyPattern).toBe('{"a":"*"}');
      const response = await store.findMockResponse(pair.request.id);
      expect(response?.statusCode).toBe(201);
      expect(response?.delayMs).toBe(5);
      expect(response?.headers).toBe('{"Content-Type":"application/json"}');
    });

    it("should reject mocks for an unknown scenario", async () => {
      await expect(addGet("missing", "/a")).rejects.toBeInstanceOf(ConfigurationError);
    });

    it("should order candidates by sequence, then by insertion", async () => {
      const scenario = await store.createScenario({ name: "happy", provider: "plaid" });
      await addGet("happy", "/first-five", 5);
      await addGet("happy", "/one", 1);
      await addGet("happy", "/second-five", 5);
      await store.createMock("happy", { method: "POST", pathPattern: "/post" }, { statusCode: 200, body: "" });

      const candidates = await store.listMockRequests(scenario.id, "GET");
      expect(candidates.map((mock) => mock.pathPattern)).toEqual(["/one", "/first-five", "/second-five"]);

      const all = await store.listScenarioMocks("happy");
      expect(all.map((pair) => pair.response.body)).toEqual(["/one", "/first-five", "/second-five", ""]);
    });

    it("should cascade deletes to requests and responses", async () => {
      const scenario = await store.createScenario({ name: "happy", provider: "plaid" });
      const pair = await addGet("happy", "/a");

      await store.deleteScenario("happy");

      expect(await store.findScenarioByName("happy")).toBeUndefined();
      expect(await store.listMockRequests(scenario.id, "GET")).toEqual([]);
      expect(await store.findMockResponse(pair.request.id)).toBeUndefined();
    });

    it("should keep at most one scenario flagged active", async () => {
      await store.createScenario({ name: "a", provider: "plaid" });
      await store.createScenario({ name: "b", provider: "plaid" });

      await store.markActive("a");
      await store.markActive("b");
      expect((await store.findScenarioByName("a"))?.isActive).toBe(false);
      expect((await store.findScenarioByName("b"))?.isActive).toBe(true);

      await store.markActive(undefined);
      expect((await store.findScenarioByName("b"))?.isActive).toBe(false);
    });

    it("should persist match counts", async () => {
      await store.createScenario({ name: "happy", provider: "plaid" });
      const pair = await addGet("happy", "/a");

      await store.incrementTimesMatched(pair.request.id);
      await store.incrementTimesMatched(pair.request.id);

      const [stored] = await store.listScenarioMocks("happy");
      expect(stored.request.timesMatched).toBe(2);
    });

    it("should wipe everything on reset", async () => {
      await store.createScenario({ name: "happy", provider: "plaid" });
      await addGet("happy", "/a");

      await store.reset();

      expect(await store.listScenarios()).toEqual([]);
    });
  });
});
