/**
 * Structured logging.
 *
 * Every module takes a component logger once at load time:
 *
 * ```typescript
 * const log = Logger.for("PresentationController");
 * log.debug({ widgetId }, "requestShow: acquired");
 * ```
 *
 * Component loggers are thin handles over a shared pino root, so
 * `Logger.configure()` after module load still takes effect everywhere.
 */

import pino, {
  type DestinationStream,
  type LevelWithSilent,
  type Logger as PinoLogger,
} from "pino";

export type LogLevel = LevelWithSilent;

export interface LoggerConfig {
  level?: LogLevel;
  /** Root logger name, emitted on every line */
  name?: string;
  /** Where lines go. Defaults to stdout. */
  destination?: DestinationStream;
}

type LogFn = {
  (msg: string): void;
  (obj: Record<string, unknown>, msg?: string): void;
};

export interface ComponentLogger {
  readonly component: string;
  trace: LogFn;
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

function levelFromEnv(): LogLevel {
  const raw = process.env.CAPTURE_LOG_LEVEL?.toLowerCase();
  return LEVELS.find((level) => level === raw) ?? "info";
}

let root: PinoLogger = pino({ name: "capture-kit", level: levelFromEnv() });
let generation = 0;

class ComponentLoggerImpl implements ComponentLogger {
  private _child: PinoLogger | null = null;
  private _generation = -1;

  constructor(readonly component: string) {}

  private get child(): PinoLogger {
    if (!this._child || this._generation !== generation) {
      this._child = root.child({ component: this.component });
      this._generation = generation;
    }
    return this._child;
  }

  trace: LogFn = (objOrMsg: Record<string, unknown> | string, msg?: string) =>
    this.write("trace", objOrMsg, msg);
  debug: LogFn = (objOrMsg: Record<string, unknown> | string, msg?: string) =>
    this.write("debug", objOrMsg, msg);
  info: LogFn = (objOrMsg: Record<string, unknown> | string, msg?: string) =>
    this.write("info", objOrMsg, msg);
  warn: LogFn = (objOrMsg: Record<string, unknown> | string, msg?: string) =>
    this.write("warn", objOrMsg, msg);
  error: LogFn = (objOrMsg: Record<string, unknown> | string, msg?: string) =>
    this.write("error", objOrMsg, msg);

  private write(
    level: "trace" | "debug" | "info" | "warn" | "error",
    objOrMsg: Record<string, unknown> | string,
    msg?: string,
  ): void {
    const child = this.child;
    if (typeof objOrMsg === "string") {
      child[level](objOrMsg);
    } else {
      child[level](objOrMsg, msg);
    }
  }
}

export const Logger = {
  /** Component-scoped logger; lines carry `component: name`. */
  for(component: string): ComponentLogger {
    return new ComponentLoggerImpl(component);
  },

  /** Replace the root logger. Existing component loggers pick it up on next write. */
  configure(config: LoggerConfig = {}): void {
    const options = { name: config.name ?? "capture-kit", level: config.level ?? levelFromEnv() };
    root = config.destination ? pino(options, config.destination) : pino(options);
    generation++;
  },

  get level(): LogLevel {
    const level = root.level;
    return LEVELS.find((l) => l === level) ?? "info";
  },
};
