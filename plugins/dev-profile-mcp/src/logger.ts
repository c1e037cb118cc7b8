import pino from "pino";

// stdout carries the MCP protocol, so every log line goes to stderr.
export const logger = pino(
  {
    name: "dev-profile",
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  },
  pino.destination(2),
);
