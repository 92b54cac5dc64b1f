import { pino, type LevelWithSilent, type Logger } from "pino";

export type ILogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

export const makeLogger = (level: LevelWithSilent = "info"): Logger =>
  level === "silent"
    ? pino({ level })
    : pino({
        level,
        base: { name: "payroll-core" },
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      });
