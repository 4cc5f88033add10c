/**
 * Logger - Structured logging with automatic context injection
 *
 * Built on pino, with automatic injection of:
 * - Engine context (engine id, pass number, phase, component being rendered)
 * - Custom metadata
 *
 * @example
 * ```typescript
 * import { Logger } from 'tessera-kernel';
 *
 * // Configure once at app start
 * Logger.configure({
 *   level: 'info',
 *   transport: {
 *     targets: [
 *       { target: 'pino-pretty', options: { colorize: true } },
 *       { target: 'pino/file', options: { destination: './app.log' } },
 *     ],
 *   },
 * });
 *
 * // Use anywhere - context is auto-injected
 * const log = Logger.for('RenderScheduler');
 * log.debug({ pending: 3 }, 'Flushing');
 * ```
 */

import pino, {
  type DestinationStream,
  type Logger as PinoLogger,
  type LoggerOptions,
  type TransportSingleOptions,
  type TransportMultiOptions,
} from "pino";
import { Context, type KernelContext } from "./context";

// =============================================================================
// Types
// =============================================================================

/**
 * Log levels supported by the kernel logger.
 *
 * Levels in order of severity (least to most):
 * - `trace` - Very detailed debugging information (every atom read)
 * - `debug` - Debugging information (renders, evictions)
 * - `info` - Normal operational messages
 * - `warn` - Recoverable conditions (stale writes, identity drift)
 * - `error` - Error conditions (effect failures)
 * - `fatal` - Aborted flushes nobody handled
 * - `silent` - Disable all logging
 */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

/**
 * Narrow an arbitrary string (an env var, a pino level) to a LogLevel.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return LOG_LEVELS.find((level) => level === value);
}

/**
 * Function to extract fields from KernelContext for logging.
 * Return an object with fields to include in every log entry.
 *
 * @example
 * ```typescript
 * const myExtractor: ContextFieldsExtractor = (ctx) => ({
 *   session: ctx.metadata.sessionId,
 * });
 * ```
 *
 * @see {@link composeContextFields} - Combine multiple extractors
 */
export type ContextFieldsExtractor<TContext extends KernelContext = KernelContext> = (
  ctx: TContext,
) => Record<string, unknown>;

export interface LoggerConfig<TContext extends KernelContext = KernelContext> {
  /** Log level (default: TESSERA_LOG_LEVEL, then 'info') */
  level?: LogLevel;
  /** Pino transport configuration */
  transport?: TransportSingleOptions | TransportMultiOptions;
  /**
   * Destination stream. Takes precedence over `transport` and `prettyPrint`.
   * Mostly useful to capture log lines in tests.
   */
  destination?: DestinationStream;
  /** Auto-inject engine context into every log (default: true) */
  includeContext?: boolean;
  /**
   * Custom function to extract fields from context.
   * Composed after the default extractor, so it may override core fields.
   */
  contextFields?: ContextFieldsExtractor<TContext>;
  /** Base properties to include in every log */
  base?: Record<string, unknown>;
  /** Custom mixin function for additional properties */
  mixin?: () => Record<string, unknown>;
  /** Pretty print through pino-pretty (default: true if NODE_ENV === 'development') */
  prettyPrint?: boolean;
  /**
   * Replace existing config instead of merging (default: false).
   */
  replace?: boolean;
}

/**
 * Log method signature supporting both message-first and object-first forms.
 *
 * @example
 * ```typescript
 * log.info('Pass complete');
 * log.warn({ identity: '0.2' }, 'Identity drift');
 * ```
 */
export interface LogMethod {
  (msg: string, ...args: unknown[]): void;
  (obj: Record<string, unknown>, msg?: string, ...args: unknown[]): void;
}

/**
 * Kernel logger interface with structured logging and context injection.
 *
 * @see {@link Logger} - Static methods to get/configure loggers
 */
export interface KernelLogger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;

  /** Create a child logger with additional bindings */
  child(bindings: Record<string, unknown>): KernelLogger;

  /** Get the current log level */
  level: LogLevel;

  /** Check if a level is enabled */
  isLevelEnabled(level: LogLevel): boolean;
}

// =============================================================================
// Implementation
// =============================================================================

let globalLogger: PinoLogger | null = null;
let globalConfig: LoggerConfig = {};

/**
 * Default context fields extractor.
 * Only extracts well-defined KernelContext properties.
 */
const defaultContextFieldsExtractor: ContextFieldsExtractor = (ctx) => {
  const fields: Record<string, unknown> = {
    engine_id: ctx.engineId,
    pass: ctx.pass,
    phase: ctx.phase,
  };

  if (ctx.traceId) fields.trace_id = ctx.traceId;
  if (ctx.component !== undefined) fields.component_id = ctx.component || "<root>";

  return fields;
};

/**
 * Extract context fields for logging.
 * Called on every log to inject current engine context.
 */
function getContextFields(config: LoggerConfig): Record<string, unknown> {
  if (config.includeContext === false) {
    return {};
  }

  const ctx = Context.tryGet();
  if (!ctx) {
    return {};
  }

  const extractor = config.contextFields ?? defaultContextFieldsExtractor;
  return extractor(ctx);
}

function resolveLevel(config: LoggerConfig): LogLevel {
  return config.level ?? parseLogLevel(process.env.TESSERA_LOG_LEVEL) ?? "info";
}

/**
 * Create pino logger options from config.
 */
function createPinoOptions(config: LoggerConfig): LoggerOptions {
  const usePretty = config.prettyPrint ?? process.env.NODE_ENV === "development";

  const options: LoggerOptions = {
    level: resolveLevel(config),
    base: config.base ?? { pid: process.pid },

    // Mixin runs on every log to inject context
    mixin: () => {
      const contextFields = getContextFields(config);
      const customFields = config.mixin?.() ?? {};
      return { ...contextFields, ...customFields };
    },

    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (config.destination) {
    return options;
  }

  if (config.transport) {
    options.transport = config.transport;
  } else if (usePretty) {
    options.transport = {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "SYS:standard",
        ignore: "pid,hostname",
      },
    };
  }

  return options;
}

function createPino(config: LoggerConfig): PinoLogger {
  const options = createPinoOptions(config);
  return config.destination ? pino(options, config.destination) : pino(options);
}

/**
 * Wrap pino logger to match KernelLogger interface.
 */
function wrapLogger(pinoLogger: PinoLogger): KernelLogger {
  return {
    trace: pinoLogger.trace.bind(pinoLogger),
    debug: pinoLogger.debug.bind(pinoLogger),
    info: pinoLogger.info.bind(pinoLogger),
    warn: pinoLogger.warn.bind(pinoLogger),
    error: pinoLogger.error.bind(pinoLogger),
    fatal: pinoLogger.fatal.bind(pinoLogger),

    child(bindings: Record<string, unknown>): KernelLogger {
      return wrapLogger(pinoLogger.child(bindings));
    },

    get level(): LogLevel {
      return parseLogLevel(pinoLogger.level) ?? "info";
    },

    isLevelEnabled(level: LogLevel): boolean {
      return pinoLogger.isLevelEnabled(level);
    },
  };
}

function getOrCreateGlobalLogger(): PinoLogger {
  if (!globalLogger) {
    globalLogger = createPino(globalConfig);
  }
  return globalLogger;
}

/**
 * Wrap a lazily-resolved pino logger so that module-level loggers created
 * with `Logger.for()` pick up a later `Logger.configure()` call.
 */
function wrapLazy(resolve: () => PinoLogger): KernelLogger {
  const method =
    (level: Exclude<LogLevel, "silent">): LogMethod =>
    (first: string | Record<string, unknown>, ...rest: unknown[]) => {
      const target = resolve();
      if (typeof first === "string") {
        target[level](first, ...rest);
      } else {
        const [msg, ...args] = rest;
        target[level](first, typeof msg === "string" ? msg : undefined, ...args);
      }
    };

  return {
    trace: method("trace"),
    debug: method("debug"),
    info: method("info"),
    warn: method("warn"),
    error: method("error"),
    fatal: method("fatal"),

    child(bindings: Record<string, unknown>): KernelLogger {
      return wrapLazy(() => resolve().child(bindings));
    },

    get level(): LogLevel {
      return parseLogLevel(resolve().level) ?? "info";
    },

    isLevelEnabled(level: LogLevel): boolean {
      return resolve().isLevelEnabled(level);
    },
  };
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Logger singleton for Tessera.
 *
 * Provides structured logging with automatic context injection from the
 * current engine context (via AsyncLocalStorage).
 *
 * @example
 * ```typescript
 * Logger.configure({ level: 'debug' });
 *
 * const log = Logger.for('LifecycleSweeper');
 * log.debug({ identity: '0.3' }, 'Evicted');
 *
 * // Or from an object (uses constructor name)
 * class RenderScheduler {
 *   private log = Logger.for(this);
 * }
 * ```
 */
export const Logger = {
  /**
   * Configure the global logger.
   * Should be called once at application startup.
   */
  configure(config: LoggerConfig): void {
    if (config.replace) {
      globalConfig = config;
    } else {
      globalConfig = { ...globalConfig, ...config };
    }

    if (config.contextFields) {
      globalConfig.contextFields = composeContextFields(defaultContextFields, config.contextFields);
    } else if (!globalConfig.contextFields) {
      globalConfig.contextFields = defaultContextFields;
    }

    globalLogger = createPino(globalConfig);
  },

  /**
   * Get the global logger instance.
   * Context is automatically injected into every log.
   */
  get(): KernelLogger {
    return wrapLogger(getOrCreateGlobalLogger());
  },

  /**
   * Create a child logger scoped to a component or name.
   * The returned logger follows later `configure()` and `reset()` calls,
   * so it is safe to create at module level.
   *
   * @param nameOrComponent Component name or object (uses constructor.name)
   */
  for(nameOrComponent: string | object): KernelLogger {
    const name =
      typeof nameOrComponent === "string" ? nameOrComponent : nameOrComponent.constructor.name;

    let source: PinoLogger | null = null;
    let child: PinoLogger | null = null;
    return wrapLazy(() => {
      const current = getOrCreateGlobalLogger();
      if (current !== source || !child) {
        source = current;
        child = current.child({ component: name });
      }
      return child;
    });
  },

  /**
   * Create a child logger with custom bindings.
   */
  child(bindings: Record<string, unknown>): KernelLogger {
    return wrapLogger(getOrCreateGlobalLogger().child(bindings));
  },

  /**
   * Create a standalone logger instance with custom config.
   * Does not affect the global logger.
   */
  create(config: LoggerConfig = {}): KernelLogger {
    return wrapLogger(createPino(config));
  },

  /**
   * Get the current log level.
   */
  get level(): LogLevel {
    return parseLogLevel(getOrCreateGlobalLogger().level) ?? "info";
  },

  /**
   * Set the log level at runtime.
   */
  setLevel(level: LogLevel): void {
    getOrCreateGlobalLogger().level = level;
  },

  /**
   * Check if a level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return getOrCreateGlobalLogger().isLevelEnabled(level);
  },

  /**
   * Reset the global logger (mainly for testing).
   */
  reset(): void {
    globalLogger = null;
    globalConfig = {};
  },
};

// =============================================================================
// Helpers
// =============================================================================

/**
 * Compose multiple context field extractors into one.
 * Later extractors override earlier ones for the same keys.
 *
 * @example
 * ```typescript
 * Logger.configure({
 *   contextFields: composeContextFields(
 *     defaultContextFields,
 *     (ctx) => ({ session: ctx.metadata.sessionId }),
 *   ),
 * });
 * ```
 */
export function composeContextFields(
  ...extractors: ContextFieldsExtractor[]
): ContextFieldsExtractor {
  return (ctx) => {
    const result: Record<string, unknown> = {};
    for (const extractor of extractors) {
      Object.assign(result, extractor(ctx));
    }
    return result;
  };
}

/**
 * The default context fields extractor.
 * Use with composeContextFields to extend.
 */
export const defaultContextFields = defaultContextFieldsExtractor;

export type { PinoLogger, DestinationStream, TransportSingleOptions, TransportMultiOptions };
