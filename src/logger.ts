import { mkdirSync } from "node:fs";
import { resolve } from "node:path";
import pino from "pino";
import { createStream } from "rotating-file-stream";
import type { AppConfig } from "./config";

export interface Loggers {
  app: pino.Logger;
  security: pino.Logger;
}

export function createLoggers(config: AppConfig): Loggers {
  const resolvedLogDir = resolve(config.logDir);
  mkdirSync(resolvedLogDir, { recursive: true });

  const appStream = createStream("app.log", {
    interval: "1d",
    size: "10M",
    rotate: 30,
    path: resolvedLogDir,
    compress: "gzip",
  });

  const securityStream = createStream("security.log", {
    interval: "1d",
    size: "10M",
    rotate: 60,
    path: resolvedLogDir,
    compress: "gzip",
  });

  const app = pino(
    {
      level: config.logLevel,
      base: {
        service: "portcullis",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    appStream,
  );

  // Provider positives and every non-allow decision land here.
  const security = pino(
    {
      level: "info",
      base: {
        service: "portcullis-security",
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    securityStream,
  );

  return { app, security };
}

/** Loggers that drop everything, for tests and embedding. */
export function createSilentLoggers(): Loggers {
  return {
    app: pino({ level: "silent" }),
    security: pino({ level: "silent" }),
  };
}
