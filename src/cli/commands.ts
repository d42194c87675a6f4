import fs from "node:fs";
import { Command } from "commander";
import chalk from "chalk";
import { ConfigError, describeConfig, getConfigPath, loadConfig } from "../config/loader.js";
import type { Config } from "../config/schema.js";
import { MessageBus } from "../bus/queue.js";
import { PubSubTopic } from "../bus/pubsub.js";
import type { Topic } from "../bus/topic.js";
import { WebSlackPlatform } from "../channels/slack/client.js";
import { Responder } from "../agent/responder.js";
import { consumeBus } from "../agent/consumer.js";
import { makeProvider } from "../providers/registry.js";
import { splitFirstCandidate, textPart } from "../providers/base.js";
import { createLogger } from "../utils/logger.js";
import { ingressRoute } from "../web/ingress.js";
import { subscriberRoute } from "../web/subscriber.js";
import { startServer, type Routes, type RunningServer } from "../web/server.js";

function loadConfigOrExit(port?: string): Config | null {
  try {
    const config = loadConfig();
    if (port) {
      const n = Number(port);
      if (!Number.isInteger(n) || n <= 0) throw new ConfigError(`--port must be a positive integer, got '${port}'`);
      config.server.port = n;
    }
    return config;
  } catch (err) {
    console.log(chalk.red(String(err)));
    process.exitCode = 1;
    return null;
  }
}

function makeResponder(config: Config): Responder {
  const slack = new WebSlackPlatform(config.slack.botToken, { debug: config.debug });
  const model = makeProvider(config);
  return new Responder({ slack, model, logger: createLogger("responder", { debug: config.debug }) });
}

function ingressRoutes(config: Config, topic: Topic): Routes {
  return {
    [`POST ${config.server.eventsPath}`]: ingressRoute({
      topic,
      logger: createLogger("ingress", { debug: config.debug }),
      forwardAppMentions: config.ingress.forwardAppMentions,
      signingSecret: config.slack.signingSecret || undefined,
    }),
  };
}

function stopOnSignal(stop: () => Promise<void>): void {
  const handler = () => {
    console.log(chalk.gray("\nShutting down..."));
    stop().catch((err: unknown) => {
      console.error(chalk.red(`Shutdown failed: ${String(err)}`));
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
}

async function serve(config: Config, routes: Routes, label: string): Promise<RunningServer> {
  const server = await startServer({
    routes,
    host: config.server.host,
    port: config.server.port,
    logger: createLogger("gateway", { debug: config.debug }),
  });
  console.log(chalk.cyan(`slackgem ${label} listening on ${config.server.host}:${server.port}`));
  for (const route of Object.keys(routes)) console.log(chalk.gray(`  ${route}`));
  return server;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name("slackgem")
    .description("slackgem - Slack to Gemini relay")
    .version("0.1.0", "-v, --version", "show version");

  program.command("publish")
    .description("Receive Slack events and publish them to Pub/Sub")
    .option("-p, --port <port>", "Listen port")
    .action(async (opts: { port?: string }) => {
      const config = loadConfigOrExit(opts.port);
      if (!config) return;
      let topic: PubSubTopic;
      try {
        topic = new PubSubTopic(config.pubsub.projectId, config.pubsub.topicId);
      } catch (err) {
        console.log(chalk.red(String(err)));
        process.exitCode = 1;
        return;
      }
      const server = await serve(config, ingressRoutes(config, topic), "publisher");
      stopOnSignal(() => server.close());
    });

  program.command("subscribe")
    .description("Answer events delivered by a Pub/Sub push subscription")
    .option("-p, --port <port>", "Listen port")
    .action(async (opts: { port?: string }) => {
      const config = loadConfigOrExit(opts.port);
      if (!config) return;
      let responder: Responder;
      try {
        responder = makeResponder(config);
      } catch (err) {
        console.log(chalk.red(String(err)));
        process.exitCode = 1;
        return;
      }
      const routes: Routes = {
        [`POST ${config.server.pushPath}`]: subscriberRoute({ responder, logger: createLogger("subscriber", { debug: config.debug }) }),
      };
      const server = await serve(config, routes, "subscriber");
      stopOnSignal(() => server.close());
    });

  program.command("gateway")
    .description("Run both stages in one process over an in-memory queue")
    .option("-p, --port <port>", "Listen port")
    .action(async (opts: { port?: string }) => {
      const config = loadConfigOrExit(opts.port);
      if (!config) return;
      let responder: Responder;
      try {
        responder = makeResponder(config);
      } catch (err) {
        console.log(chalk.red(String(err)));
        process.exitCode = 1;
        return;
      }
      const bus = new MessageBus();
      const server = await serve(config, ingressRoutes(config, bus), "gateway");
      const consuming = consumeBus(bus, responder, createLogger("subscriber", { debug: config.debug }));
      stopOnSignal(async () => {
        await server.close();
        bus.close();
        await consuming;
      });
      await consuming;
    });

  program.command("status").description("Show resolved configuration").action(() => {
    const configPath = getConfigPath();
    const config = loadConfigOrExit();
    if (!config) return;
    console.log("slackgem Status\n");
    console.log(`Config: ${configPath} ${fs.existsSync(configPath) ? "yes" : "no"}`);
    for (const [label, value] of describeConfig(config)) console.log(`${label.padEnd(22)} ${value}`);
  });

  program.command("doctor").description("Check Slack and model connectivity").action(async () => {
    const config = loadConfigOrExit();
    if (!config) return;
    console.log(chalk.cyan("slackgem doctor\n"));

    try {
      const slack = new WebSlackPlatform(config.slack.botToken, { debug: config.debug });
      console.log(chalk.green(`Slack check passed: bot user ${await slack.identity()}`));
    } catch (err) {
      console.log(chalk.red(`Slack check failed: ${String(err)}`));
      process.exitCode = 1;
    }

    try {
      const model = makeProvider(config);
      const { texts } = splitFirstCandidate(await model.generate([textPart("Reply with: OK")]));
      console.log(chalk.green(`Model check passed: ${texts.join(" ").trim() || "(empty response)"}`));
    } catch (err) {
      console.log(chalk.red(`Model check failed: ${String(err)}`));
      process.exitCode = 1;
    }
  });

  return program;
}
