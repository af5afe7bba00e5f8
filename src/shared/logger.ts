import { pino, type DestinationStream, type Logger, type LoggerOptions } from 'pino';

const nodeEnv = process.env['NODE_ENV'] ?? 'development';
const usePrettyOutput = nodeEnv !== 'production' && nodeEnv !== 'test';

/** Error instances become plain objects; message strings pass through. */
const errorSerializer = (error: unknown): unknown => {
  if (error instanceof Error) {
    return {
      type: error.constructor.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return error;
};

function baseOptions(level: string): LoggerOptions {
  return {
    level,
    serializers: {
      err: errorSerializer,
      error: errorSerializer,
    },
    formatters: {
      level(label) {
        return { level: label };
      },
      bindings(bindings) {
        return {
          pid: bindings['pid'],
          hostname: bindings['hostname'],
        };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

function consoleStream(): DestinationStream {
  if (usePrettyOutput) {
    return pino.transport({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:HH:MM:ss.l',
        ignore: 'pid,hostname',
        singleLine: false,
      },
    });
  }
  return pino.destination({ dest: 1, sync: false });
}

export interface CreateLoggerOptions {
  /** Extra destinations that receive every record (e.g. the run log channel). */
  sinks?: DestinationStream[];
  /** Defaults to LOG_LEVEL, then "info". */
  level?: string;
  /** Write to stdout as well as the sinks. Default true. */
  console?: boolean;
}

function buildStreams(options: CreateLoggerOptions): pino.MultiStreamRes {
  const streams: pino.StreamEntry[] = [];
  if (options.console ?? true) {
    streams.push({ level: 'trace', stream: consoleStream() });
  }
  for (const sink of options.sinks ?? []) {
    streams.push({ level: 'trace', stream: sink });
  }
  return pino.multistream(streams);
}

/**
 * Builds a logger that tees every record into the console stream and any
 * extra sinks.
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? process.env['LOG_LEVEL'] ?? 'info';
  return pino(baseOptions(level), buildStreams(options));
}

const rootStreams = buildStreams({});
const rootLogger: Logger = pino(baseOptions(process.env['LOG_LEVEL'] ?? 'info'), rootStreams);

/**
 * Tees the root logger (and every child of it) into `sink` from now on.
 * The run log channel is attached this way at startup, so the control
 * surface sees exactly what the console sees.
 */
export function addLogSink(sink: DestinationStream): void {
  rootStreams.add({ level: 'trace', stream: sink });
}

export type ModuleName =
  | 'survey'
  | 'runner'
  | 'browser'
  | 'captcha'
  | 'profile'
  | 'server';

const childLoggerCache = new Map<string, Logger>();

/**
 * Creates or retrieves a cached child logger for a specific module.
 * Child loggers automatically include the module name in all log output.
 */
export function getLogger(module: ModuleName, bindings?: Record<string, unknown>): Logger {
  const cacheKey = bindings ? `${module}:${JSON.stringify(bindings)}` : module;

  const cached = childLoggerCache.get(cacheKey);
  if (cached) {
    return cached;
  }

  const child = rootLogger.child({ module, ...bindings });
  childLoggerCache.set(cacheKey, child);
  return child;
}

/**
 * Sets the level of the root logger and of every module logger handed out
 * so far. Children copy their parent's level when created, so module-level
 * loggers made before the environment was read would otherwise keep the
 * startup default.
 */
export function setLogLevel(level: string): void {
  rootLogger.level = level;
  for (const child of childLoggerCache.values()) {
    child.level = level;
  }
}

export { rootLogger as logger };
export type { Logger, DestinationStream };
