import { describe, expect, it, vi } from "vitest";
import { createClient } from "../../client.js";
import type { FetchLike } from "../../context.js";
import { createLogger } from "../../logger.js";
import { jsonResponse } from "./helpers.js";

const logger = createLogger({ enabled: false });

describe("createClient", () => {
  it("wires the services through one transport and reports on them", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ models: [{ name: "MiniMax-M2.1" }] }));
    const client = createClient({ token: "test-token", config: { maxRetries: 0 }, fetch: fetchMock, logger });

    await client.models.listModels();
    await client.models.listModels();

    const report = client.getPerformanceReport();
    expect(report).toMatchObject({ totalRequests: 2, successfulRequests: 2, failedRequests: 0, successRate: 100 });
    expect(client.getRequestHistory().map((record) => record.kind)).toEqual(["model", "model"]);
  });

  it("keeps credentials and history per client", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({}));
    const first = createClient({ token: "first-token", config: {}, fetch: fetchMock, logger });
    const second = createClient({
      credentials: { accessToken: "second-token", refreshToken: "second-refresh" },
      config: {},
      fetch: fetchMock,
      logger
    });

    await first.profile.getUserData();

    expect(first.auth.getCredentials()?.accessToken).toBe("first-token");
    expect(second.auth.getCredentials()?.refreshToken).toBe("second-refresh");
    expect(second.getPerformanceReport().totalRequests).toBe(0);
  });

  it("forgets credentials and history on close", async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ response: "ok" }));
    const client = createClient({ token: "test-token", config: {}, fetch: fetchMock, logger });

    await client.chat.sendMessage("hi");
    client.close();

    expect(client.auth.getCredentials()).toBeNull();
    expect(client.getPerformanceReport().totalRequests).toBe(0);
    expect(client.chat.getHistory()).toEqual([]);
  });
});
