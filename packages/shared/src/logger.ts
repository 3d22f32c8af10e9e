import pino, {
  type Logger,
  type LevelWithSilent,
  type LoggerOptions,
} from "pino";
import { variables } from "./environment";

function defaultLevel(): LevelWithSilent {
  if (variables.LOG_LEVEL) return variables.LOG_LEVEL;
  switch (variables.NODE_ENV) {
    case "development":
      return "debug";
    case "test":
      return "silent";
    default:
      return "info";
  }
}

let root: Logger | null = null;

function rootLogger(): Logger {
  if (root) return root;

  const options: LoggerOptions = {
    level: defaultLevel(),
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
  };

  // stdout carries command output, logs go to stderr
  root =
    variables.NODE_ENV === "development"
      ? pino({
          ...options,
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              translateTime: "HH:MM:ss Z",
              ignore: "pid,hostname",
              destination: 2,
            },
          },
        })
      : pino(options, pino.destination(2));
  return root;
}

/**
 * Create a child logger for a module. The root logger is built on first use,
 * after the environment has had a chance to be populated.
 */
export function createLogger(name: string): Logger {
  return rootLogger().child({ name });
}

export type { Logger };
