type FormatString = `\x1b[${string}m`;

enum TextFormat {
  Reset = "\x1b[0m",
  Gray = "\x1b[38;5;249m",
  Timestamp = "\x1b[38;5;24m",
  Label = "\x1b[38;5;183m",
  Error = "\x1b[38;5;1m",
  Success = "\x1b[38;5;42m",
  Warn = "\x1b[38;5;228m",
  Info = "\x1b[38;5;117m",
  Debug = "\x1b[38;5;187m",
  Init = "\x1b[38;5;75m",
}

const levels = {
  debug: { severity: 0, format: TextFormat.Debug },
  info: { severity: 1, format: TextFormat.Info },
  init: { severity: 1, format: TextFormat.Init },
  ready: { severity: 1, format: TextFormat.Success },
  warn: { severity: 2, format: TextFormat.Warn },
  error: { severity: 3, format: TextFormat.Error },
} as const;

export type LogLevel = keyof typeof levels;

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && value in levels;

const MAX_LEVEL_LENGTH = 5;

const defaultLevel = (): LogLevel => {
  const configured = process.env.LOG_LEVEL;
  if (isLogLevel(configured)) return configured;
  return process.env.NODE_ENV === "development" ? "debug" : "info";
};

/** Shared by the root logger and every child */
const settings: { level: LogLevel } = { level: defaultLevel() };

const stringify = (arg: unknown) => {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  try {
    return JSON.stringify(arg, null, 2);
  } catch {
    return String(arg);
  }
};

export class Logger {
  /** Shown after the level, e.g. the connection a line is about */
  readonly label: string | null;

  constructor(label: string | null = null) {
    this.label = label;
  }

  get level() {
    return settings.level;
  }

  setLevel(level: LogLevel) {
    settings.level = level;
  }

  /** A logger whose lines are tagged with `label` */
  child(label: string) {
    return new Logger(this.label ? `${this.label}:${label}` : label);
  }

  protected get timestamp() {
    const dateString = new Date().toLocaleString("en-US", {
      month: "2-digit",
      day: "2-digit",
      year: "numeric",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
      timeZoneName: "shortGeneric",
    });
    const [day, time] = dateString.split(", ");
    return `${day.replace(/\//g, "-")} @ ${time}`;
  }

  protected format(formatStr: FormatString, content: string) {
    return `${formatStr}${content}${TextFormat.Reset}`;
  }

  protected getPrefix(level: LogLevel) {
    const symbol = this.format.bind(this, TextFormat.Gray);

    const timestampStr =
      symbol("[") +
      this.format(TextFormat.Timestamp, this.timestamp) +
      symbol("]");

    const levelStr =
      symbol("[") +
      this.format(levels[level].format, level.toUpperCase()) +
      symbol("]") +
      " ".repeat(MAX_LEVEL_LENGTH - level.length) +
      symbol(":");

    const labelStr = this.label
      ? ` ${symbol("(")}${this.format(TextFormat.Label, this.label)}${symbol(")")}`
      : "";

    return `${timestampStr} ${levelStr}${labelStr}`;
  }

  protected log(level: LogLevel, ...args: unknown[]) {
    if (process.env.DISABLE_LOGGING === "true") return;
    if (levels[level].severity < levels[settings.level].severity) return;
    console.log(this.getPrefix(level), args.map(stringify).join(" "));
  }

  debug = this.log.bind(this, "debug");
  info = this.log.bind(this, "info");
  init = this.log.bind(this, "init");
  ready = this.log.bind(this, "ready");
  warn = this.log.bind(this, "warn");
  error = this.log.bind(this, "error");
}

export const logger = new Logger();
