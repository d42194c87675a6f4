import { fileTypeFromBuffer } from "file-type";
import type { Blob } from "../providers/base.js";
import type { Logger } from "../utils/logger.js";

export type Fetcher = (url: string) => Promise<Buffer>;

const TEXT_CONTROL_BYTES = new Set([0x09, 0x0a, 0x0c, 0x0d, 0x1b]);

function looksLikeText(data: Buffer): boolean {
  for (const b of data) {
    if (b < 0x20 && !TEXT_CONTROL_BYTES.has(b)) return false;
  }
  try {
    new TextDecoder("utf-8", { fatal: true }).decode(data);
    return true;
  } catch {
    return false;
  }
}

/** Sniffs the MIME type from the bytes; response headers are never consulted. */
export async function detectContentType(data: Buffer): Promise<string> {
  const detected = await fileTypeFromBuffer(data);
  if (detected) return detected.mime;
  return looksLikeText(data) ? "text/plain" : "application/octet-stream";
}

/**
 * Downloads every URL at once and waits for all of them. Failed downloads are
 * logged and left out; the result carries no ordering guarantee.
 */
export async function fetchBlobs(urls: string[], fetcher: Fetcher, logger: Logger): Promise<Blob[]> {
  if (!urls.length) return [];
  const settled = await Promise.allSettled(
    urls.map(async (url): Promise<Blob> => {
      if (!url) throw new Error("empty file URL");
      const data = await fetcher(url);
      return { mimeType: await detectContentType(data), data };
    }),
  );
  const blobs: Blob[] = [];
  settled.forEach((result, i) => {
    if (result.status === "fulfilled") blobs.push(result.value);
    else logger.warn(`Failed to fetch file data from ${urls[i] || "(empty)"}: ${String(result.reason)}`);
  });
  return blobs;
}
