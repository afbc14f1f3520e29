import { CombineWarning } from "../types/warnings";

export type LogLevel = "INFO" | "WARNING" | "ERROR";

export interface LogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Sink for every decision a combine run makes. One instance per subject run;
 * stages receive it explicitly instead of reaching for a process-wide logger.
 */
export interface Reporter {
  info(message: string): Promise<void>;
  warn(warning: CombineWarning): Promise<void>;
  error(message: string): Promise<void>;
  warnings(): CombineWarning[];
}

export function formatLogEntry(entry: LogEntry): string {
  return `${entry.level}: ${entry.message}`;
}

export class MemoryReporter implements Reporter {
  readonly entries: LogEntry[] = [];
  private readonly raised: CombineWarning[] = [];

  async info(message: string): Promise<void> {
    this.entries.push({ level: "INFO", message });
  }

  async warn(warning: CombineWarning): Promise<void> {
    this.raised.push(warning);
    this.entries.push({ level: "WARNING", message: warning.message });
  }

  async error(message: string): Promise<void> {
    this.entries.push({ level: "ERROR", message });
  }

  warnings(): CombineWarning[] {
    return [...this.raised];
  }

  lines(): string[] {
    return this.entries.map(formatLogEntry);
  }
}
