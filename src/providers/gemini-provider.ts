import {
  GoogleGenerativeAI,
  type Content,
  type GenerateContentResponse,
  type GenerativeModel as GeminiModel,
  type Part as GeminiPart,
} from "@google/generative-ai";
import { blobPart, textPart, type ChatSession, type GenerativeModel, type ModelResponse, type Part, type Turn } from "./base.js";

export function toGeminiPart(part: Part): GeminiPart {
  switch (part.kind) {
    case "text":
      return { text: part.text };
    case "blob":
      return { inlineData: { mimeType: part.blob.mimeType, data: part.blob.data.toString("base64") } };
  }
}

export function toGeminiContent(turn: Turn): Content {
  return { role: turn.role, parts: turn.parts.map(toGeminiPart) };
}

function fromGeminiPart(part: GeminiPart): Part | null {
  if (typeof part.text === "string") return textPart(part.text);
  if (part.inlineData) {
    return blobPart({ mimeType: part.inlineData.mimeType, data: Buffer.from(part.inlineData.data, "base64") });
  }
  // function calls, code execution and file references carry nothing we can post
  return null;
}

export function fromGeminiResult(result: { response: GenerateContentResponse }): ModelResponse {
  const candidates = (result.response.candidates ?? []).map((cand) => ({
    parts: (cand.content?.parts ?? []).map(fromGeminiPart).filter((p): p is Part => p !== null),
  }));
  return { candidates };
}

export class GeminiProvider implements GenerativeModel {
  private readonly model: GeminiModel;

  constructor(apiKey: string, readonly name: string, apiBase: string | null = null) {
    const client = new GoogleGenerativeAI(apiKey);
    this.model = client.getGenerativeModel({ model: name }, apiBase ? { baseUrl: apiBase } : undefined);
  }

  async generate(parts: Part[]): Promise<ModelResponse> {
    const result = await this.model.generateContent(parts.map(toGeminiPart));
    return fromGeminiResult(result);
  }

  startChat(history: Turn[]): ChatSession {
    const chat = this.model.startChat({ history: history.map(toGeminiContent) });
    return {
      send: async (parts) => fromGeminiResult(await chat.sendMessage(parts.map(toGeminiPart))),
    };
  }
}
