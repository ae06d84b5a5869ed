export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
};

function formatLine(scope: string, message: string, meta?: LogMeta): string {
  const suffix =
    meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `[${scope}] ${message}${suffix}`;
}

export function createLogger(
  scope: string,
  options: { debug?: boolean } = {},
): Logger {
  const debugEnabled = options.debug ?? process.env.CONFSCHED_DEBUG === '1';
  return {
    debug(message, meta) {
      if (debugEnabled) console.debug(formatLine(scope, message, meta));
    },
    info(message, meta) {
      console.log(formatLine(scope, message, meta));
    },
    warn(message, meta) {
      console.warn(formatLine(scope, message, meta));
    },
    error(message, meta) {
      console.error(formatLine(scope, message, meta));
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
