import { describe, expect, it, vi } from "vitest";
import { TransportError } from "../src/core/errors";
import { FetchLike, HttpTransport, isRetriableStatus } from "../src/core/transport";

interface FakeReply {
  status: number;
  body?: string;
  url?: string;
  contentType?: string;
}

function toArrayBuffer(text: string): ArrayBuffer {
  const bytes = Buffer.from(text, "utf-8");
  const out = new ArrayBuffer(bytes.length);
  new Uint8Array(out).set(bytes);
  return out;
}

function reply({ status, body = "", url = "", contentType }: FakeReply) {
  return {
    ok: status >= 200 && status < 300,
    status,
    url,
    headers: { get: (name: string) => (name.toLowerCase() === "content-type" ? (contentType ?? null) : null) },
    arrayBuffer: async () => toArrayBuffer(body),
  };
}

function createTransport(
  fetchFn: FetchLike,
  overrides: { maxRetries?: number; timeoutMs?: number; retryDelayMs?: number } = {},
): HttpTransport {
  return new HttpTransport({
    userAgent: "test-agent/1.0",
    timeoutMs: overrides.timeoutMs ?? 1_000,
    maxRetries: overrides.maxRetries ?? 0,
    retryDelayMs: overrides.retryDelayMs ?? 0,
    fetchFn,
  });
}

describe("http transport", () => {
  it("returns the final address, content type and body", async () => {
    const fetchFn = vi.fn<FetchLike>(async () =>
      reply({ status: 200, body: "<html></html>", url: "https://certs.example.com/c/1/", contentType: "text/html" }),
    );
    const response = await createTransport(fetchFn).fetch({
      url: "https://certs.example.com/lookup",
      method: "POST",
      headers: { "content-type": "application/x-www-form-urlencoded" },
      body: "CertNum=1",
    });

    expect(response.url).toBe("https://certs.example.com/c/1/");
    expect(response.contentType).toBe("text/html");
    expect(response.body.toString("utf-8")).toBe("<html></html>");

    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe("https://certs.example.com/lookup");
    expect(init.method).toBe("POST");
    expect(init.body).toBe("CertNum=1");
    expect(init.headers).toEqual({
      "user-agent": "test-agent/1.0",
      "content-type": "application/x-www-form-urlencoded",
    });
    expect(init.dispatcher).toBeUndefined();
  });

  it("falls back to the request address when the response has none", async () => {
    const response = await createTransport(async () => reply({ status: 200, body: "x" })).fetch({
      url: "https://media.example.com/1.jpg",
    });

    expect(response.url).toBe("https://media.example.com/1.jpg");
    expect(response.contentType).toBeUndefined();
  });

  it("retries a retriable status and then succeeds", async () => {
    const fetchFn = vi
      .fn<FetchLike>()
      .mockResolvedValueOnce(reply({ status: 503 }))
      .mockResolvedValueOnce(reply({ status: 200, body: "ok" }));

    const response = await createTransport(fetchFn, { maxRetries: 1 }).fetch({ url: "https://certs.example.com/" });

    expect(response.body.toString("utf-8")).toBe("ok");
    expect(fetchFn).toHaveBeenCalledTimes(2);
  });

  it("does not retry a client error", async () => {
    const fetchFn = vi.fn<FetchLike>(async () => reply({ status: 404 }));

    const error = await createTransport(fetchFn, { maxRetries: 2 })
      .fetch({ url: "https://certs.example.com/missing" })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ statusCode: 404, message: "HTTP 404", attempts: 1 });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it("gives up after the last retry of a network error", async () => {
    const fetchFn = vi.fn<FetchLike>(async () => {
      throw new Error("socket hang up");
    });

    const error = await createTransport(fetchFn, { maxRetries: 2 })
      .fetch({ url: "https://certs.example.com/" })
      .catch((caught: unknown) => caught);

    expect(error).toMatchObject({ code: "TRANSPORT_ERROR", message: "socket hang up", attempts: 3 });
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it("aborts a request that exceeds the timeout", async () => {
    const fetchFn: FetchLike = (_url, init) =>
      new Promise((_resolve, reject) => {
        init.signal.addEventListener("abort", () => reject(new Error("aborted")));
      });

    const error = await createTransport(fetchFn, { timeoutMs: 20 })
      .fetch({ url: "https://certs.example.com/slow" })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: "Request timed out after 20ms" });
  });

  it("does not start a request once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchFn = vi.fn<FetchLike>(async () => reply({ status: 200 }));

    await expect(createTransport(fetchFn).fetch({ url: "https://certs.example.com/" }, controller.signal)).rejects.toThrow(
      "Request cancelled",
    );
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it("stops waiting between retries once cancelled", async () => {
    const controller = new AbortController();
    const fetchFn = vi.fn<FetchLike>(async () => {
      setTimeout(() => controller.abort(), 10);
      return reply({ status: 503 });
    });
    const startedAt = Date.now();

    const error = await createTransport(fetchFn, { maxRetries: 3, retryDelayMs: 60_000 })
      .fetch({ url: "https://certs.example.com/" }, controller.signal)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ message: "Request cancelled", attempts: 1 });
    expect(fetchFn).toHaveBeenCalledTimes(1);
    expect(Date.now() - startedAt).toBeLessThan(2_000);
  });

  it("classifies retriable statuses", () => {
    expect([408, 429, 500, 503, 400, 403, 404].map(isRetriableStatus)).toEqual([true, true, true, true, false, false, false]);
  });
});
