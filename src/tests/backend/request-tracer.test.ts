import { describe, expect, it } from "vitest";
import { RequestTracer, newTraceId } from "../../transport/request-tracer.js";
import { NOW, testContext } from "./helpers.js";

describe("newTraceId", () => {
  it("returns 32 lowercase hex characters", () => {
    expect(newTraceId()).toMatch(/^[0-9a-f]{32}$/);
  });
});

describe("RequestTracer", () => {
  it("reports zeros before any request", () => {
    const { context } = testContext();
    const tracer = new RequestTracer(context);

    expect(tracer.report()).toEqual({
      totalRequests: 0,
      successfulRequests: 0,
      failedRequests: 0,
      successRate: 0,
      avgCostMs: 0,
      recentRequests: []
    });
  });

  it("records a finished request once", () => {
    const { context, clock } = testContext();
    const tracer = new RequestTracer(context);

    const handle = tracer.start("model", "POST", "/model/list");
    expect(tracer.inFlight).toBe(1);
    clock.now += 120;

    expect(tracer.finish(handle, { outcome: "success", statusCode: 200 }, "{}")).toBe(true);
    expect(tracer.finish(handle, { outcome: "failure" })).toBe(false);

    expect(tracer.inFlight).toBe(0);
    expect(tracer.history()).toEqual([
      {
        traceId: handle.traceId,
        kind: "model",
        method: "POST",
        path: "/model/list",
        outcome: "success",
        statusCode: 200,
        durationMs: 120,
        startedAt: new Date(NOW).toISOString(),
        summary: "{}"
      }
    ]);
  });

  it("aggregates success rate and average cost", () => {
    const { context, clock } = testContext();
    const tracer = new RequestTracer(context);

    for (const [cost, outcome] of [
      [100, "success"],
      [200, "success"],
      [300, "failure"]
    ] as const) {
      const handle = tracer.start("chat", "POST", "/chat/completions");
      clock.now += cost;
      tracer.finish(handle, { outcome });
    }

    const report = tracer.report();
    expect(report.totalRequests).toBe(3);
    expect(report.successfulRequests).toBe(2);
    expect(report.failedRequests).toBe(1);
    expect(report.successRate).toBe(66.67);
    expect(report.avgCostMs).toBe(200);
    expect(report.recentRequests).toHaveLength(3);
  });

  it("drops the oldest records beyond maxHistory", () => {
    const { context } = testContext({ maxHistory: 2 });
    const tracer = new RequestTracer(context);

    const handles = [1, 2, 3].map((n) => tracer.start("other", "GET", `/item/${n}`));
    handles.forEach((handle) => tracer.finish(handle, { outcome: "success" }));

    expect(tracer.history().map((record) => record.path)).toEqual(["/item/2", "/item/3"]);
  });

  it("hands out copies of the history and clears on reset", () => {
    const { context } = testContext();
    const tracer = new RequestTracer(context);
    tracer.finish(tracer.start("other", "GET", "/ping"), { outcome: "success" });

    tracer.history().length = 0;
    expect(tracer.history()).toHaveLength(1);

    tracer.reset();
    expect(tracer.history()).toEqual([]);
  });
});
