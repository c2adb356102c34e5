import { describe, it, expect } from "vitest";
import { MockBuilder } from "../../../src/builder/mock-builder";
import { ConfigurationError, NoMatchError } from "../../../src/errors";

describe("builder", () => {
  describe("mock-builder", () => {
    it("should build, activate and serve a scenario", async () => {
      const builder = await MockBuilder.create();
      await builder.scenario("happy-path", "plaid");
      await builder.onGet("/accounts/{id}").respondJson({ balance: 100 });
      const backend = await builder.activate("happy-path");

      const response = await backend.get("/accounts/42");

      expect(response.status).toBe(200);
      expect(response.body).toBe('{"balance":100}');
      expect(response.headers).toEqual({ "Content-Type": "application/json" });
      await expect(backend.get("/unknown")).rejects.toThrow("No mock found for GET /unknown");
      await backend.close();
    });

    it("should refuse mocks before a scenario is selected", async () => {
      const builder = await MockBuilder.create();

      await expect(builder.onGet("/accounts").respondOk("[]")).rejects.toBeInstanceOf(ConfigurationError);
      await expect(builder.activate()).rejects.toThrow("No scenario to activate");
      await builder.build().close();
    });

    it("should carry request options into the stored mock", async () => {
      const builder = await MockBuilder.create();
      await builder.scenario("payments", "truelayer", "Payment flows");
      await builder
        .onPost("/payments")
        .withBodyContaining('{"amount":"*"}')
        .withHeaders({ "Idempotency-Key": "*" })
        .withSequence(7)
        .withDelay(5)
        .respondError(422, '{"error":"invalid"}');

      const [mock] = await builder.build().listMocks("payments");

      expect(mock.request.method).toBe("POST");
      expect(mock.request.bodyPattern).toBe('{"amount":"*"}');
      expect(mock.request.headersPattern).toBe('{"Idempotency-Key":"*"}');
      expect(mock.request.sequenceOrder).toBe(7);
      expect(mock.response.statusCode).toBe(422);
      expect(mock.response.delayMs).toBe(5);
      expect(mock.response.body).toBe('{"error":"invalid"}');
      expect((await builder.build().getScenario("payments"))?.description).toBe("Payment flows");
      await builder.build().close();
    });

    it("should activate the current scenario by default", async () => {
      const builder = await MockBuilder.create();
      await builder.scenario("first", "mx");
      await builder.onDelete("/members/{id}").respond({ statusCode: 204, body: "" });
      await builder.scenario("second", "mx");
      await builder.onPut("/members/{id}").respondJson({ ok: true }, 201);

      const backend = await builder.activate();

      expect(backend.activeScenario()).toBe("second");
      expect((await backend.put("/members/1", { name: "x" })).status).toBe(201);
      await expect(backend.delete("/members/1")).rejects.toBeInstanceOf(NoMatchError);
      await backend.close();
    });

    it("should register mocks in call order", async () => {
      const builder = await MockBuilder.create();
      await builder.scenario("ordered", "yapily");
      await builder.onPatch("/consents/{id}").respondOk("first");
      await builder.onPatch("/consents/{id}").respondOk("second");
      const backend = await builder.activate();

      expect((await backend.patch("/consents/c1", {})).body).toBe("first");
      await backend.close();
    });
  });
});
