/**
 * Structured logging for boostsmith
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type Logger = pino.Logger;

export interface LogContext {
  installId?: string;
  stage?: string;
  component?: string;
  [key: string]: unknown;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function resolveLevel(raw: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === raw);
  return level ?? 'info';
}

// stdout belongs to CLI output, so every log line goes to stderr
function createBaseLogger(level: LogLevel): pino.Logger {
  const options: pino.LoggerOptions = {
    level,
    base: {
      service: 'boostsmith',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (process.env.NODE_ENV === 'development') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino(options, pino.destination({ dest: 2, sync: true }));
}

let loggerInstance: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!loggerInstance) {
    loggerInstance = createBaseLogger(resolveLevel(process.env.LOG_LEVEL));
  }
  return loggerInstance;
}

export function createChildLogger(context: LogContext): pino.Logger {
  return getLogger().child(context);
}

export function createLogger(name: string): pino.Logger {
  return createChildLogger({ component: name });
}

export function logStageTransition(
  installId: string,
  fromStage: string,
  toStage: string
): void {
  getLogger().info(
    {
      event: 'stage_transition',
      installId,
      fromStage,
      toStage,
    },
    `Stage transition: ${fromStage} -> ${toStage}`
  );
}

export function logToolInvocation(
  installId: string,
  stage: string,
  command: string,
  args: readonly string[]
): void {
  getLogger().debug(
    {
      event: 'tool_invocation',
      installId,
      stage,
      command,
      args,
    },
    `Running ${command}`
  );
}

// Reset logger (for testing)
export function resetLogger(): void {
  loggerInstance = null;
}
