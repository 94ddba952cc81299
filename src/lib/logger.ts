type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Fields appended to every line, e.g. the learner a request acts for. */
export type LogContext = Readonly<Record<string, string | number>>;

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  /** Same module, with `context` merged into the bound fields. */
  with(context: LogContext): Logger;
}

function renderContext(context: LogContext): string {
  const pairs = Object.entries(context).map(([key, value]) => `${key}=${value}`);
  return pairs.length > 0 ? ` {${pairs.join(' ')}}` : '';
}

function writerFor(level: LogLevel): (...args: unknown[]) => void {
  if (level === 'error') return console.error;
  if (level === 'warn') return console.warn;
  return console.log;
}

/** Console logger tagged with a module name. Debug lines need DEBUG set. */
export function createLogger(module: string, context: LogContext = {}): Logger {
  const emit = (level: LogLevel, message: string, data: unknown) => {
    if (level === 'debug' && !process.env.DEBUG) return;
    const line = `${new Date().toISOString()} ${level.toUpperCase()} [${module}] ${message}${renderContext(context)}`;
    const write = writerFor(level);
    if (data === undefined) {
      write(line);
    } else {
      write(line, data);
    }
  };

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
    with: (extra) => createLogger(module, { ...context, ...extra }),
  };
}

export const studyLog = createLogger('study');
export const storeLog = createLogger('store');
export const apiLog = createLogger('api');
