import pino, { type Logger } from "pino";

export type { Logger };

// stdout belongs to the MCP stdio transport
export function createLogger(level: string = process.env.LOG_LEVEL ?? "info"): Logger {
  return pino(
    {
      name: "run-ledger",
      level,
      formatters: {
        level: (label) => ({ level: label })
      },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination(2)
  );
}
