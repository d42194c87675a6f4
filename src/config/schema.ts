export type ProviderName = "gemini" | "openai";

export interface ProviderConfig {
  apiKey: string;
  apiBase: string | null;
}

export interface Config {
  debug: boolean;
  slack: {
    botToken: string;
    signingSecret: string;
  };
  model: {
    provider: ProviderName;
    name: string;
  };
  providers: Record<ProviderName, ProviderConfig>;
  pubsub: {
    projectId: string;
    topicId: string;
  };
  ingress: {
    forwardAppMentions: boolean;
  };
  server: {
    host: string;
    port: number;
    eventsPath: string;
    pushPath: string;
  };
}

export const PROVIDER_NAMES: readonly ProviderName[] = ["gemini", "openai"];

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  gemini: "gemini-1.5-flash",
  openai: "gpt-4o-mini",
};

export const DEFAULT_CONFIG: Config = {
  debug: false,
  slack: { botToken: "", signingSecret: "" },
  model: { provider: "gemini", name: DEFAULT_MODELS.gemini },
  providers: {
    gemini: { apiKey: "", apiBase: null },
    openai: { apiKey: "", apiBase: null },
  },
  pubsub: { projectId: "", topicId: "slack-gemini" },
  ingress: { forwardAppMentions: false },
  server: { host: "0.0.0.0", port: 8080, eventsPath: "/slack/events", pushPath: "/pubsub/push" },
};

export function isProviderName(name: string): name is ProviderName {
  return PROVIDER_NAMES.some((p) => p === name);
}
