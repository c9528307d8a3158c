export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

const timestamp = (): string => new Date().toISOString().slice(11, 23);

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export type ConsoleLoggerOptions = {
  /** Print info lines as well as warnings and errors. */
  verbose?: boolean;
  /** Prefix lines with the time of day. */
  timestamps?: boolean;
};

export const createConsoleLogger = ({ verbose = true, timestamps = false }: ConsoleLoggerOptions = {}): Logger => {
  const stamp = (line: string): string => (timestamps ? `${timestamp()} ${line}` : line);
  return {
    info(message) {
      if (verbose) console.log(stamp(message));
    },
    warn(message) {
      console.warn(stamp(`[WARN] ${message}`));
    },
    error(message, error) {
      const detail = error ? ` ${error instanceof Error ? error.message : String(error)}` : "";
      console.error(stamp(`[ERROR] ${message}${detail}`));
    },
  };
};

/** Collects lines instead of printing them. */
export class MemoryLogger implements Logger {
  readonly lines: { level: "info" | "warn" | "error"; message: string }[] = [];

  info(message: string): void {
    this.lines.push({ level: "info", message });
  }

  warn(message: string): void {
    this.lines.push({ level: "warn", message });
  }

  error(message: string, error?: unknown): void {
    const detail = error ? ` ${error instanceof Error ? error.message : String(error)}` : "";
    this.lines.push({ level: "error", message: `${message}${detail}` });
  }

  messages(level: "info" | "warn" | "error"): string[] {
    return this.lines.filter((line) => line.level === level).map((line) => line.message);
  }
}
