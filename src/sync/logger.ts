import winston from "winston";

const isProduction = process.env.NODE_ENV === "production";

export const logger = winston.createLogger({
  level: process.env.SYNC_LOG_LEVEL || "info",
  silent: process.env.NODE_ENV === "test",
  format: isProduction
    ? winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      )
    : winston.format.combine(
        winston.format.timestamp({ format: "HH:mm:ss" }),
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, context, runId, ...rest }) => {
          const ctx = context ? `[${String(context)}]` : "";
          const run = runId ? ` (${String(runId).slice(0, 8)})` : "";
          const extra = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : "";
          return `${String(timestamp)} ${level} ${ctx}${run} ${String(message)}${extra}`;
        })
      ),
  // Console on stderr keeps stdout clean for the CLI's JSON summary.
  transports: [new winston.transports.Console({ stderrLevels: ["error", "warn", "info", "debug"] })],
});

export function createChildLogger(context: string, meta?: { runId?: string }) {
  return logger.child({ context, ...meta });
}
