import type { Config } from "../config/schema.js";
import type { GenerativeModel } from "./base.js";
import { GeminiProvider } from "./gemini-provider.js";
import { OpenAICompatibleProvider } from "./openai-provider.js";

export function makeProvider(config: Config): GenerativeModel {
  const { provider, name } = config.model;
  const p = config.providers[provider];
  switch (provider) {
    case "gemini":
      if (!p.apiKey.trim()) throw new Error("No API key configured for provider 'gemini'. Set GEMINI_API_KEY.");
      return new GeminiProvider(p.apiKey, name, p.apiBase);
    case "openai":
      if (!p.apiKey.trim() && !p.apiBase) throw new Error("No API key configured for provider 'openai'. Set OPENAI_API_KEY or OPENAI_BASE_URL.");
      return new OpenAICompatibleProvider(p.apiKey || "no-key", name, p.apiBase);
  }
}
