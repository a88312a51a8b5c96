import pino from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
  level?: LogLevel;
  appName?: string;
}

/**
 * Diagnostic logger. Writes JSON lines to stderr so stdout stays reserved for
 * the step progress and the run report.
 */
export function createLogger(config: LoggerConfig = {}): pino.Logger {
  const { level = "info", appName = "provision-pilot" } = config;
  return pino(
    {
      level,
      base: { pid: process.pid, app: appName },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ dest: 2, sync: true })
  );
}

let globalLogger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!globalLogger) {
    globalLogger = createLogger({ level: "warn" });
  }
  return globalLogger;
}

/** Replace the global logger (tests install a silent one). */
export function setLogger(logger: pino.Logger): void {
  globalLogger = logger;
}

export function stepLogger(step: string): pino.Logger {
  return getLogger().child({ step });
}
