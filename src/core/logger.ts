import pino from 'pino';

export interface LoggerOptions {
  level?: pino.LevelWithSilent;
  /** Human-readable, colorized output via pino-pretty */
  pretty?: boolean;
  /** Write JSON lines to this file instead of stdout */
  file?: string;
  /** Console file descriptor: 1 (stdout, default) or 2 (stderr) */
  destination?: 1 | 2;
}

export function createLogger(name: string = 'fleetsim', options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? 'info';

  if (options.pretty) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: options.destination ?? 1 },
      },
    });
  }

  if (options.file) {
    return pino({
      name,
      level,
      transport: {
        target: 'pino/file',
        options: { destination: options.file, mkdir: true },
      },
    });
  }

  return pino({ name, level }, pino.destination(options.destination ?? 1));
}

let _logger: pino.Logger | null = null;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}
