export type LogLevel = "debug" | "info" | "warn" | "error";

/** One log entry as delivered to listeners. */
export interface LogEntry {
  level: LogLevel;
  /** Dotted component path, e.g. `sentiment-classifier.engine`. */
  scope: string;
  message: string;
  data?: unknown;
}

export type LogListener = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Minimum level written to the console. @default "warn" */
  level?: LogLevel;
  /** @default "sentiment-classifier" */
  scope?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Levelled console logger for the classifier.
 *
 * Console output is tagged with the logger's scope and filtered by level.
 * Listeners receive every entry regardless of level, so monitoring hooks
 * and tests can observe debug traffic without it reaching the console.
 * Children created with {@link child} share their parent's level and
 * listeners.
 */
export class Logger {
  readonly scope: string;
  #state: { level: LogLevel; listeners: Set<LogListener> };

  constructor(options: LoggerOptions = {}) {
    this.scope = options.scope ?? "sentiment-classifier";
    this.#state = { level: options.level ?? "warn", listeners: new Set() };
  }

  get level(): LogLevel {
    return this.#state.level;
  }

  setLevel(level: LogLevel): void {
    this.#state.level = level;
  }

  /** A logger for a sub-component, sharing this logger's level and listeners. */
  child(name: string): Logger {
    const child = new Logger({ scope: `${this.scope}.${name}` });
    child.#state = this.#state;
    return child;
  }

  addListener(listener: LogListener): () => void {
    this.#state.listeners.add(listener);
    return () => this.removeListener(listener);
  }

  removeListener(listener: LogListener): void {
    this.#state.listeners.delete(listener);
  }

  debug(message: string, data?: unknown): void {
    this.#log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.#log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.#log("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.#log("error", message, data);
  }

  #log(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = { level, scope: this.scope, message, data };
    if (LEVEL_ORDER[level] >= LEVEL_ORDER[this.#state.level]) {
      const line = `${new Date().toISOString()} ${level.toUpperCase()} [${this.scope}] ${message}`;
      // eslint-disable-next-line no-console
      const write = level === "debug" ? console.debug : console[level];
      if (data === undefined) write(line);
      else write(line, data);
    }
    this.#state.listeners.forEach((listener) => listener(entry));
  }
}

/** Shared default instance used when no logger is configured. */
export const logger = new Logger();
