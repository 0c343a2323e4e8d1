import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { beforeEach, describe, expect, it } from "vitest";
import { TransportError } from "../src/core/errors";
import { certDirName, detectExtension, MediaStore } from "../src/download/mediaStore";
import { MetricsRegistry } from "../src/observability";
import { binaryResponse, FakeTransport, quietLogger } from "./helpers/fakes";

let root: string;

beforeEach(() => {
  root = mkdtempSync(path.join(os.tmpdir(), "cert-media-"));
});

function createStore(transport: FakeTransport, metrics = new MetricsRegistry()): MediaStore {
  return new MediaStore({ transport, rootDir: root, defaultExtension: "jpg", logger: quietLogger(), metrics });
}

describe("extension detection", () => {
  it("prefers the declared content type", () => {
    expect(detectExtension("image/png; charset=binary", "https://x.example/a.jpg", "jpg")).toBe("png");
  });

  it("falls back to the last path segment of the URL", () => {
    expect(detectExtension(undefined, "https://x.example/dir/photo.JPEG?size=large", "jpg")).toBe("jpeg");
    expect(detectExtension("text/html", "https://x.example/a%20b.webp", "jpg")).toBe("webp");
  });

  it("uses the default when neither source gives an extension", () => {
    expect(detectExtension("application/octet-stream", "https://x.example/dir/noext", "jpg")).toBe("jpg");
    expect(detectExtension(undefined, "https://x.example/dir.v2/", "bin")).toBe("bin");
  });
});

describe("certificate directory names", () => {
  it("percent-encodes path separators and reserved names", () => {
    expect(certDirName("12/34")).toBe("12%2F34");
    expect(certDirName("..")).toBe("%2E.");
    expect(certDirName(".hidden")).toBe("%2Ehidden");
    expect(certDirName("50%")).toBe("50%25");
    expect(certDirName('a:b*c?"d<e>f|g\\h')).toBe("a%3Ab%2Ac%3F%22d%3Ce%3Ef%7Cg%5Ch");
    expect(certDirName("tab\there")).toBe("tab%09here");
    expect(certDirName("5551234-001")).toBe("5551234-001");
  });

  it("gives distinct identifiers distinct names", () => {
    const names = ["a/b", "a_b", "a%2Fb", "a%b", ".", "%2E"].map(certDirName);
    expect(new Set(names).size).toBe(names.length);
  });
});

describe("media store", () => {
  it("stores each reference under its position and keeps going after a failure", async () => {
    const transport = new FakeTransport((request) => {
      if (request.url.endsWith("/2")) {
        return new TransportError(request.url, "HTTP 503", 503);
      }
      if (request.url.endsWith("/1")) {
        return binaryResponse(request.url, "image/png", "png-bytes");
      }
      return binaryResponse(request.url, "image/jpeg", "jpeg-bytes");
    });
    const metrics = new MetricsRegistry();
    const store = createStore(transport, metrics);

    const results = await store.storeAll(
      "1001",
      [
        { url: "https://media.example.com/1", position: 1 },
        { url: "https://media.example.com/2", position: 2 },
        { url: "https://media.example.com/3", position: 3 },
      ],
      { referer: "https://certs.example.com/certlookup/1001/" },
    );

    expect(results.map((result) => [result.index, result.status])).toEqual([
      [1, "stored"],
      [2, "failed"],
      [3, "stored"],
    ]);
    expect(results[1].error).toBe("HTTP 503");
    expect(readdirSync(path.join(root, "1001")).sort()).toEqual(["image_1.png", "image_3.jpg"]);
    expect(readFileSync(path.join(root, "1001", "image_3.jpg"), "utf8")).toBe("jpeg-bytes");
    expect(transport.urls()).toEqual([
      "https://media.example.com/1",
      "https://media.example.com/2",
      "https://media.example.com/3",
    ]);
    expect(transport.requests[0].headers?.referer).toBe("https://certs.example.com/certlookup/1001/");
    expect(metrics.getCounters().downloads_ok).toBe(2);
    expect(metrics.getCounters().downloads_failed).toBe(1);
  });

  it("treats an empty body as a failed download", async () => {
    const transport = new FakeTransport((request) => binaryResponse(request.url, "image/jpeg", ""));
    const results = await createStore(transport).storeAll("2002", [{ url: "https://media.example.com/e.jpg", position: 1 }]);

    expect(results[0]).toEqual({
      cert: "2002",
      index: 1,
      url: "https://media.example.com/e.jpg",
      status: "failed",
      error: "Empty response body",
    });
    expect(existsSync(path.join(root, "2002"))).toBe(false);
  });

  it("replaces a file stored earlier under another extension", async () => {
    mkdirSync(path.join(root, "3003"), { recursive: true });
    writeFileSync(path.join(root, "3003", "image_1.jpg"), "old");
    writeFileSync(path.join(root, "3003", "image_10.jpg"), "other");
    const transport = new FakeTransport((request) => binaryResponse(request.url, "image/webp", "new"));

    await createStore(transport).storeAll("3003", [{ url: "https://media.example.com/a", position: 1 }]);

    expect(readdirSync(path.join(root, "3003")).sort()).toEqual(["image_1.webp", "image_10.jpg"]);
  });

  it("keeps the files of identifiers that differ only in reserved characters", async () => {
    const transport = new FakeTransport((request) => binaryResponse(request.url, "image/jpeg", request.url));
    const store = createStore(transport);

    await store.storeAll("a/b", [{ url: "https://media.example.com/slash.jpg", position: 1 }]);
    await store.storeAll("a_b", [{ url: "https://media.example.com/underscore.jpg", position: 1 }]);

    expect(store.certDir("a/b")).not.toBe(store.certDir("a_b"));
    expect(readFileSync(path.join(root, "a%2Fb", "image_1.jpg"), "utf8")).toBe("https://media.example.com/slash.jpg");
    expect(readFileSync(path.join(root, "a_b", "image_1.jpg"), "utf8")).toBe("https://media.example.com/underscore.jpg");
  });

  it("stops before the next reference once cancelled", async () => {
    const controller = new AbortController();
    const transport = new FakeTransport((request) => {
      controller.abort();
      return binaryResponse(request.url, "image/png", "png");
    });

    const results = await createStore(transport).storeAll(
      "4004",
      [
        { url: "https://media.example.com/1.png", position: 1 },
        { url: "https://media.example.com/2.png", position: 2 },
      ],
      { signal: controller.signal },
    );

    expect(results.map((result) => result.status)).toEqual(["stored"]);
    expect(transport.requests).toHaveLength(1);
  });
});
