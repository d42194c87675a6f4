import chalk from "chalk";

export interface Logger {
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  debug(msg: string, ...args: unknown[]): void;
}

const scopeColors: Record<string, (s: string) => string> = {
  ingress: chalk.cyan,
  responder: chalk.magenta,
  subscriber: chalk.blue,
  gateway: chalk.green,
  slack: chalk.yellow,
};

export function createLogger(scope: string, opts: { debug?: boolean } = {}): Logger {
  const color = scopeColors[scope] ?? chalk.white;
  const prefix = `[${color(scope)}]`;
  return {
    info: (msg, ...args) => console.log(prefix, msg, ...args),
    warn: (msg, ...args) => console.warn(prefix, chalk.yellow(msg), ...args),
    error: (msg, ...args) => console.error(prefix, chalk.red(msg), ...args),
    debug: (msg, ...args) => {
      if (opts.debug) console.log(prefix, chalk.gray(msg), ...args);
    },
  };
}
