import pino from "pino";
import { loadConfig } from "../configs/environment";

const config = loadConfig();

const prettyTransport = {
  target: "pino-pretty",
  options: {
    colorize: true,
    translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
    ignore: "hostname,pid,service",
  },
};

export const logger = pino({
  level: config.logging.level,
  base: { service: "gym-partner-catalog" },
  timestamp: pino.stdTimeFunctions.isoTime,
  transport: config.logging.pretty ? prettyTransport : undefined,
});

export type Logger = typeof logger;
