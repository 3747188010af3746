type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

let debugEnabled = false;

export function setDebugLogging(enabled: boolean): void {
  debugEnabled = enabled;
}

export function isDebugLogging(): boolean {
  return debugEnabled;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  return {
    debug(message, context) {
      if (!debugEnabled) {
        return;
      }
      if (context) {
        console.log(prefix, message, context);
        return;
      }
      console.log(prefix, message);
    },
    info(message, context) {
      if (context) {
        console.log(prefix, message, context);
        return;
      }
      console.log(prefix, message);
    },
    warn(message, context) {
      if (context) {
        console.warn(prefix, message, context);
        return;
      }
      console.warn(prefix, message);
    },
    error(message, context) {
      if (context) {
        console.error(prefix, message, context);
        return;
      }
      console.error(prefix, message);
    },
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
