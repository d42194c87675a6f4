import { describe, expect, test } from "vitest";
import { detectContentType, fetchBlobs } from "../src/agent/attachments.js";
import { recordingLogger } from "./fakes.js";

// signature, IHDR chunk, IDAT chunk header
const PNG = Buffer.concat([
  Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
  Buffer.from([0, 0, 0, 13]),
  Buffer.from("IHDR"),
  Buffer.alloc(13),
  Buffer.alloc(4),
  Buffer.from([0, 0, 0, 0]),
  Buffer.from("IDAT"),
  Buffer.alloc(4),
]);

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("detectContentType", () => {
  test("sniffs images from magic bytes", async () => {
    expect(await detectContentType(PNG)).toBe("image/png");
  });

  test("falls back to text for readable bytes", async () => {
    expect(await detectContentType(Buffer.from("meeting notes\nline two\n"))).toBe("text/plain");
  });

  test("falls back to octet-stream for binary bytes", async () => {
    expect(await detectContentType(Buffer.from([0x02, 0x00, 0x03, 0x00, 0x04, 0x00]))).toBe("application/octet-stream");
  });
});

describe("fetchBlobs", () => {
  test("returns nothing for no URLs without fetching", async () => {
    let calls = 0;
    const blobs = await fetchBlobs([], async () => {
      calls += 1;
      return Buffer.alloc(0);
    }, recordingLogger());
    expect(blobs).toEqual([]);
    expect(calls).toBe(0);
  });

  test("skips failed downloads and logs them", async () => {
    const logger = recordingLogger();
    const files: Record<string, Buffer> = {
      "https://files.example/a": Buffer.from("first"),
      "https://files.example/c": PNG,
    };
    const blobs = await fetchBlobs(
      ["https://files.example/a", "https://files.example/b", "https://files.example/c"],
      async (url) => {
        const data = files[url];
        if (!data) throw new Error("boom");
        return data;
      },
      logger,
    );
    expect(blobs.map((b) => b.mimeType).sort()).toEqual(["image/png", "text/plain"]);
    expect(logger.lines).toEqual([["warn", "Failed to fetch file data from https://files.example/b: Error: boom"]]);
  });

  test("counts an empty URL as a failure", async () => {
    const logger = recordingLogger();
    const blobs = await fetchBlobs([""], async () => Buffer.from("x"), logger);
    expect(blobs).toEqual([]);
    expect(logger.lines).toEqual([["warn", "Failed to fetch file data from (empty): Error: empty file URL"]]);
  });

  test("starts every download before any completes", async () => {
    const started: string[] = [];
    const pending = new Map<string, ReturnType<typeof deferred<Buffer>>>();
    const urls = ["https://files.example/1", "https://files.example/2", "https://files.example/3"];
    const result = fetchBlobs(
      urls,
      (url) => {
        started.push(url);
        const d = deferred<Buffer>();
        pending.set(url, d);
        return d.promise;
      },
      recordingLogger(),
    );

    expect(started).toEqual(urls);
    for (const url of [...urls].reverse()) pending.get(url)?.resolve(Buffer.from(`body of ${url}`));

    const blobs = await result;
    expect(blobs).toHaveLength(3);
    expect(blobs.every((b) => b.mimeType === "text/plain")).toBe(true);
  });

  test("waits for a slow failure before returning", async () => {
    const logger = recordingLogger();
    const pending = new Map<string, ReturnType<typeof deferred<Buffer>>>();
    const urls = ["https://files.example/fast", "https://files.example/also-fast", "https://files.example/slow"];
    let done = false;
    const result = fetchBlobs(
      urls,
      (url) => {
        const d = deferred<Buffer>();
        pending.set(url, d);
        return d.promise;
      },
      logger,
    ).then((blobs) => {
      done = true;
      return blobs;
    });

    pending.get("https://files.example/fast")?.resolve(Buffer.from("one"));
    pending.get("https://files.example/also-fast")?.resolve(Buffer.from("two"));
    await new Promise((r) => setTimeout(r, 20));
    expect(done).toBe(false);

    pending.get("https://files.example/slow")?.reject(new Error("timed out"));
    const blobs = await result;
    expect(done).toBe(true);
    expect(blobs.map((b) => b.data.toString("utf8")).sort()).toEqual(["one", "two"]);
    expect(logger.lines).toEqual([["warn", "Failed to fetch file data from https://files.example/slow: Error: timed out"]]);
  });
});
