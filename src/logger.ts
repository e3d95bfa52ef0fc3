import pino, { Logger, LoggerOptions } from "pino";

const options: LoggerOptions = {
  level: process.env.LOG_LEVEL ?? "info",
  base: { service: "research-fetch" },
  redact: {
    paths: ["headers.authorization", "headers[\"x-api-key\"]", "proxyUrl"],
    censor: "[redacted]",
  },
};

// The MCP stdio server owns stdout, so it logs with LOG_STREAM=stderr.
const destination = process.env.LOG_STREAM === "stderr" ? 2 : 1;

if (process.env.NODE_ENV === "development") {
  options.transport = { target: "pino-pretty", options: { destination } };
}

export const logger = options.transport ? pino(options) : pino(options, pino.destination(destination));

export function jobLogger(job: { id: string; task_id: string; domain: string }): Logger {
  return logger.child({ jobId: job.id, taskId: job.task_id, domain: job.domain });
}
