export interface Blob {
  mimeType: string;
  data: Buffer;
}

export type Part =
  | { kind: "text"; text: string }
  | { kind: "blob"; blob: Blob };

export type Role = "user" | "model";

export interface Turn {
  role: Role;
  parts: Part[];
}

export interface Candidate {
  parts: Part[];
}

export interface ModelResponse {
  candidates: Candidate[];
}

export interface ChatSession {
  send(parts: Part[]): Promise<ModelResponse>;
}

export interface GenerativeModel {
  readonly name: string;
  generate(parts: Part[]): Promise<ModelResponse>;
  startChat(history: Turn[]): ChatSession;
}

export function textPart(text: string): Part {
  return { kind: "text", text };
}

export function blobPart(blob: Blob): Part {
  return { kind: "blob", blob };
}

/** Splits the first candidate into its text and binary parts; later candidates are ignored. */
export function splitFirstCandidate(res: ModelResponse): { texts: string[]; blobs: Blob[] } {
  const texts: string[] = [];
  const blobs: Blob[] = [];
  const first = res.candidates[0];
  if (!first) return { texts, blobs };
  for (const part of first.parts) {
    switch (part.kind) {
      case "text":
        texts.push(part.text);
        break;
      case "blob":
        blobs.push(part.blob);
        break;
      default: {
        const unreachable: never = part;
        throw new Error(`unknown part ${JSON.stringify(unreachable)}`);
      }
    }
  }
  return { texts, blobs };
}
