import { describe, it, expect, vi } from "vitest";
import { UpstreamClient, type HttpResponse } from "./upstream-client.js";
import { UpstreamError } from "../errors.js";
import { RateGate } from "../polling/rate-gate.js";

function response(status: number, data: unknown = {}): HttpResponse {
  return { status, statusText: status === 200 ? "OK" : "ERR", data };
}

describe("UpstreamClient", () => {
  it("returns the body of a 2xx response and sends the api key", async () => {
    const get = vi.fn().mockResolvedValue(response(200, { hello: "world" }));
    const client = new UpstreamClient("tomtom", {
      baseUrl: "https://example.test",
      apiKey: "test-key",
      timeoutMs: 1234,
      transport: { get },
    });

    const data = await client.get("/flow", { point: "1,2" });

    expect(data).toEqual({ hello: "world" });
    expect(get).toHaveBeenCalledTimes(1);
    const [path, config] = get.mock.calls[0]!;
    expect(path).toBe("/flow");
    expect(config.baseURL).toBe("https://example.test");
    expect(config.timeout).toBe(1234);
    expect(config.params).toEqual({ point: "1,2", key: "test-key" });
  });

  it("omits the key parameter when no api key is configured", async () => {
    const get = vi.fn().mockResolvedValue(response(200));
    const client = new UpstreamClient("nhtsa", {
      baseUrl: "https://example.test",
      transport: { get },
    });

    await client.get("/ratings", { format: "json" });

    expect(get.mock.calls[0]![1].params).toEqual({ format: "json" });
  });

  it("retries 429 and 5xx responses", async () => {
    const get = vi
      .fn()
      .mockResolvedValueOnce(response(429))
      .mockResolvedValueOnce(response(503))
      .mockResolvedValueOnce(response(200, [1, 2]));
    const client = new UpstreamClient("tomtom", {
      baseUrl: "https://example.test",
      retryDelaysMs: [0, 0],
      transport: { get },
    });

    await expect(client.get("/flow")).resolves.toEqual([1, 2]);
    expect(get).toHaveBeenCalledTimes(3);
  });

  it("passes the gate before every attempt, retries included", async () => {
    let clock = 0;
    const gate = new RateGate({
      minSpacingMs: 250,
      now: () => clock,
      sleep: async (ms) => {
        clock += ms;
      },
    });
    const sentAt: number[] = [];
    const get = vi.fn(async () => {
      sentAt.push(clock);
      return sentAt.length < 3 ? response(503) : response(200, "ok");
    });
    const client = new UpstreamClient("nhtsa", {
      baseUrl: "https://example.test",
      retryDelaysMs: [0, 0],
      gate,
      transport: { get },
    });

    await expect(client.get("/ratings")).resolves.toBe("ok");
    expect(sentAt).toEqual([0, 250, 500]);
  });

  it("fails immediately on other 4xx statuses", async () => {
    const get = vi.fn().mockResolvedValue(response(404));
    const client = new UpstreamClient("tomtom", {
      baseUrl: "https://example.test",
      retryDelaysMs: [0, 0],
      transport: { get },
    });

    const err = await client.get("/flow").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(UpstreamError);
    expect(err).toMatchObject({ source: "tomtom", status: 404 });
    expect(get).toHaveBeenCalledTimes(1);
  });

  it("gives up after the last retry", async () => {
    const get = vi.fn().mockRejectedValue(new Error("ECONNRESET"));
    const client = new UpstreamClient("tomtom", {
      baseUrl: "https://example.test",
      retryDelaysMs: [0],
      transport: { get },
    });

    await expect(client.get("/flow")).rejects.toThrow(
      "tomtom network error: ECONNRESET"
    );
    expect(get).toHaveBeenCalledTimes(2);
  });

  it("does not retry a request whose signal was aborted", async () => {
    const controller = new AbortController();
    const get = vi.fn().mockImplementation(async () => {
      controller.abort();
      throw new Error("canceled");
    });
    const client = new UpstreamClient("tomtom", {
      baseUrl: "https://example.test",
      retryDelaysMs: [0, 0],
      transport: { get },
    });

    await expect(client.get("/flow", {}, controller.signal)).rejects.toThrow(
      /aborted/
    );
    expect(get).toHaveBeenCalledTimes(1);
  });
});
