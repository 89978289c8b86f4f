export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean | undefined;
  githubActions?: boolean | undefined;
  sink?: ((line: string) => void) | undefined;
}

type Level = keyof Logger;

// Workflow command names understood by GitHub Actions.
const ANNOTATIONS: Record<Level, string> = {
  debug: 'debug',
  info: 'notice',
  warn: 'warning',
  error: 'error',
};

let defaults: LoggerOptions = {};

export function configureLogging(options: LoggerOptions): void {
  defaults = { ...options };
}

export function createLogger(scope: string, options: LoggerOptions = defaults): Logger {
  const verbose = options.verbose ?? false;
  const githubActions = options.githubActions ?? process.env.GITHUB_ACTIONS === 'true';
  const sink = options.sink ?? ((line: string) => console.log(line));

  const emit = (level: Level, message: string) => {
    if (level === 'debug' && !verbose) {
      return;
    }
    if (githubActions) {
      sink(`::${ANNOTATIONS[level]}::[${scope}] ${message}`);
      return;
    }
    const prefix = level === 'info' ? '' : `${level.toUpperCase()} `;
    sink(`${prefix}[${scope}] ${message}`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
