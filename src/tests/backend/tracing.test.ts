import { describe, expect, it } from "vitest";
import { initTracing, parseHeaders, shutdownTracing } from "../../tracing.js";

describe("parseHeaders", () => {
  it("parses comma separated key=value pairs", () => {
    expect(parseHeaders("x-api-key=test-secret, x-tenant = demo")).toEqual({
      "x-api-key": "test-secret",
      "x-tenant": "demo"
    });
  });

  it("keeps '=' inside values and drops incomplete pairs", () => {
    expect(parseHeaders("auth=a=b,broken,=value")).toEqual({ auth: "a=b" });
    expect(parseHeaders("broken")).toBeUndefined();
    expect(parseHeaders("a=,b=2")).toEqual({ b: "2" });
    expect(parseHeaders(undefined)).toBeUndefined();
  });
});

describe("initTracing", () => {
  it("does nothing without an exporter endpoint", async () => {
    await expect(initTracing()).resolves.toBeUndefined();
    await expect(initTracing({ serviceName: "trae-test" })).resolves.toBeUndefined();
    await expect(shutdownTracing()).resolves.toBeUndefined();
  });
});
