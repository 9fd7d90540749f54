/** Names of the five severity levels, lowest first. */
export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'critical';

/**
 * Raised when something that is not a genuine LogLevel is used where one
 * is required. Level *names* are rejected too; only the constants count.
 */
export class InvalidLogLevelError extends Error {
  readonly code = 'INVALID_LOG_LEVEL';
  readonly level: unknown;

  constructor(level: unknown) {
    super(`Invalid log level: ${describe(level)}`);
    this.name = 'InvalidLogLevelError';
    this.level = level;
  }
}

function describe(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  if (value instanceof LogLevel) return `LogLevel.${value.name}`;
  return Object.prototype.toString.call(value);
}

/**
 * Severity enumeration with a fixed total order:
 * debug < info < warn < error < critical.
 *
 * The constructor is private, so the five static members are the only
 * LogLevel values that can exist.
 */
export class LogLevel {
  static readonly debug = new LogLevel('debug', 0);
  static readonly info = new LogLevel('info', 1);
  static readonly warn = new LogLevel('warn', 2);
  static readonly error = new LogLevel('error', 3);
  static readonly critical = new LogLevel('critical', 4);

  /** All levels in ascending order. */
  static readonly all: readonly LogLevel[] = [
    LogLevel.debug,
    LogLevel.info,
    LogLevel.warn,
    LogLevel.error,
    LogLevel.critical,
  ];

  private constructor(
    readonly name: LogLevelName,
    readonly rank: number,
  ) {}

  static isLevel(value: unknown): value is LogLevel {
    return value instanceof LogLevel && LogLevel.all.includes(value);
  }

  /** Look up a level by its name. Unknown names throw InvalidLogLevelError. */
  static levelWithName(name: string): LogLevel {
    const level = LogLevel.all.find((l) => l.name === name);
    if (level === undefined) {
      throw new InvalidLogLevelError(name);
    }
    return level;
  }

  /** Strictly lower in the total order. */
  isBelow(other: LogLevel): boolean {
    return this.rank < other.rank;
  }

  toString(): string {
    return `LogLevel.${this.name}`;
  }

  toJSON(): string {
    return this.name;
  }
}
