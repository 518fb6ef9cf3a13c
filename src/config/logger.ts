import pino from "pino";
import { loadSharedConfig } from "./shared.js";

const config = loadSharedConfig();

export const logger = pino({
  name: "mailsift",
  level: config.logLevel,
  timestamp: pino.stdTimeFunctions.isoTime,
  transport:
    config.env === "development"
      ? {
          target: "pino/file",
          options: { destination: 1 },
        }
      : undefined,
});
