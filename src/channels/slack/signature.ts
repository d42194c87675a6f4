import { createHmac, timingSafeEqual } from "node:crypto";

const SLACK_SIGNATURE_VERSION = "v0";
const SLACK_TIMESTAMP_TOLERANCE_S = 60 * 5;

export function signSlackRequest(signingSecret: string, timestamp: string, rawBody: Buffer): string {
  const base = `${SLACK_SIGNATURE_VERSION}:${timestamp}:${rawBody.toString("utf8")}`;
  return `${SLACK_SIGNATURE_VERSION}=${createHmac("sha256", signingSecret).update(base).digest("hex")}`;
}

export function verifySlackSignature(
  signingSecret: string,
  timestamp: string,
  rawBody: Buffer,
  signature: string,
  nowMs: number = Date.now(),
): boolean {
  const ts = parseInt(timestamp, 10);
  if (Number.isNaN(ts)) return false;
  if (Math.abs(Math.floor(nowMs / 1000) - ts) > SLACK_TIMESTAMP_TOLERANCE_S) return false;

  const expected = Buffer.from(signSlackRequest(signingSecret, timestamp, rawBody));
  const given = Buffer.from(signature);
  // compare byte lengths: a non-ASCII header is longer in bytes than in chars
  if (expected.length !== given.length) return false;
  return timingSafeEqual(expected, given);
}
