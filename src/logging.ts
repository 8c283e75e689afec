import pino, { type LevelWithSilent, type Logger, type LoggerOptions } from "pino";

export type ILogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

export interface LogSettings {
  pretty?: boolean;
}

export const loggerOptions = (
  level: LevelWithSilent,
  { pretty = false }: LogSettings = {},
): LoggerOptions =>
  pretty
    ? {
        level,
        transport: {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "HH:MM:ss.l" },
        },
      }
    : { level };

export const makeLogger = (
  level: LevelWithSilent = "info",
  settings: LogSettings = {},
): ILogger => pino(loggerOptions(level, settings));
