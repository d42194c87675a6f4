import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { z } from "zod";
import { DEFAULT_CONFIG, DEFAULT_MODELS, isProviderName, type Config } from "./schema.js";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

const providerSchema = z.object({ apiKey: z.string(), apiBase: z.string().nullable() }).partial();

const fileSchema = z
  .object({
    debug: z.boolean(),
    slack: z.object({ botToken: z.string(), signingSecret: z.string() }).partial(),
    model: z.object({ provider: z.enum(["gemini", "openai"]), name: z.string() }).partial(),
    providers: z.object({ gemini: providerSchema, openai: providerSchema }).partial(),
    pubsub: z.object({ projectId: z.string(), topicId: z.string() }).partial(),
    ingress: z.object({ forwardAppMentions: z.boolean() }).partial(),
    server: z.object({ host: z.string(), port: z.number().int().positive(), eventsPath: z.string(), pushPath: z.string() }).partial(),
  })
  .partial();

type FileConfig = z.infer<typeof fileSchema>;

export function getConfigPath(env: Env = process.env): string {
  return env.SLACKGEM_CONFIG || path.join(os.homedir(), ".slackgem", "config.json");
}

export function parseBool(name: string, value: string): boolean {
  const v = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["", "0", "false", "no", "off"].includes(v)) return false;
  throw new ConfigError(`${name} must be a boolean, got '${value}'`);
}

function mergeFile(base: Config, file: FileConfig): Config {
  return {
    debug: file.debug ?? base.debug,
    slack: { ...base.slack, ...file.slack },
    model: { ...base.model, ...file.model },
    providers: {
      gemini: { ...base.providers.gemini, ...file.providers?.gemini },
      openai: { ...base.providers.openai, ...file.providers?.openai },
    },
    pubsub: { ...base.pubsub, ...file.pubsub },
    ingress: { ...base.ingress, ...file.ingress },
    server: { ...base.server, ...file.server },
  };
}

function readConfigFile(p: string): FileConfig {
  if (!fs.existsSync(p)) return {};
  try {
    return fileSchema.parse(JSON.parse(fs.readFileSync(p, "utf8")));
  } catch (err) {
    console.warn(`Warning: Failed to load config from ${p}: ${String(err)}`);
    return {};
  }
}

function applyEnv(config: Config, env: Env): Config {
  const out = structuredClone(config);
  if (env.SLACK_BOT_TOKEN !== undefined) out.slack.botToken = env.SLACK_BOT_TOKEN;
  if (env.SLACK_SIGNING_SECRET !== undefined) out.slack.signingSecret = env.SLACK_SIGNING_SECRET;
  if (env.GEMINI_API_KEY !== undefined) out.providers.gemini.apiKey = env.GEMINI_API_KEY;
  if (env.OPENAI_API_KEY !== undefined) out.providers.openai.apiKey = env.OPENAI_API_KEY;
  if (env.OPENAI_BASE_URL) out.providers.openai.apiBase = env.OPENAI_BASE_URL;
  if (env.PROJECT_ID !== undefined) out.pubsub.projectId = env.PROJECT_ID;
  if (env.TOPIC_ID) out.pubsub.topicId = env.TOPIC_ID;
  if (env.DEBUG !== undefined) out.debug = parseBool("DEBUG", env.DEBUG);

  if (env.MODEL_PROVIDER) {
    const provider = env.MODEL_PROVIDER.trim().toLowerCase();
    if (!isProviderName(provider)) throw new ConfigError(`MODEL_PROVIDER must be one of gemini, openai, got '${env.MODEL_PROVIDER}'`);
    if (provider !== out.model.provider && out.model.name === DEFAULT_MODELS[out.model.provider]) {
      out.model.name = DEFAULT_MODELS[provider];
    }
    out.model.provider = provider;
  }
  if (env.MODEL_NAME) out.model.name = env.MODEL_NAME;

  if (env.PORT) {
    const port = Number(env.PORT);
    if (!Number.isInteger(port) || port <= 0) throw new ConfigError(`PORT must be a positive integer, got '${env.PORT}'`);
    out.server.port = port;
  }
  return out;
}

export function loadConfig(opts: { configPath?: string; env?: Env } = {}): Config {
  const env = opts.env ?? process.env;
  const file = readConfigFile(opts.configPath ?? getConfigPath(env));
  return applyEnv(mergeFile(structuredClone(DEFAULT_CONFIG), file), env);
}

function mask(secret: string): string {
  if (!secret) return "not set";
  return secret.length <= 8 ? "set" : `${secret.slice(0, 6)}...`;
}

export function describeConfig(config: Config): Array<[string, string]> {
  return [
    ["Debug", config.debug ? "yes" : "no"],
    ["Slack bot token", mask(config.slack.botToken)],
    ["Slack signing secret", config.slack.signingSecret ? "set" : "not set"],
    ["Model", `${config.model.provider}/${config.model.name}`],
    ["Gemini API key", mask(config.providers.gemini.apiKey)],
    ["OpenAI API key", mask(config.providers.openai.apiKey)],
    ["OpenAI base URL", config.providers.openai.apiBase ?? "default"],
    ["Pub/Sub project", config.pubsub.projectId || "not set"],
    ["Pub/Sub topic", config.pubsub.topicId],
    ["Forward app_mention", config.ingress.forwardAppMentions ? "yes" : "no"],
    ["Listen", `${config.server.host}:${config.server.port}`],
    ["Events path", config.server.eventsPath],
    ["Push path", config.server.pushPath],
  ];
}
