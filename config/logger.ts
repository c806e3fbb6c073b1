import pino from "pino";

const LOGGER_NAME = "pipewright";

/** Log records go to stderr; stdout carries command output. */
export function createLogger(env: NodeJS.ProcessEnv = process.env): pino.Logger {
  const level = env.LOG_LEVEL ?? "info";

  if (env.NODE_ENV === "production") {
    return pino({ name: LOGGER_NAME, level }, pino.destination(2));
  }

  return pino({
    name: LOGGER_NAME,
    level,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:HH:MM:ss",
        ignore: "pid,hostname,name",
        singleLine: true,
        destination: 2,
      },
    },
  });
}

export const logger = createLogger();

export type Logger = pino.Logger;
