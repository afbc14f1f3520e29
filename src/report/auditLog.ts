import { promises as fs } from "fs";
import path from "path";
import { ensureDir } from "../utils/fs";
import { IOError } from "../errors";
import { CombineWarning } from "../types/warnings";
import { LogEntry, LogLevel, Reporter, formatLogEntry } from "./reporter";

export interface AuditLogOptions {
  /** Echo warnings to stderr as well as the log file. Defaults to true. */
  echoWarnings?: boolean;
}

/**
 * Append-only log kept beside the combined output (the subject's README).
 * Not safe for concurrent writers: one invocation per subject per output tree.
 */
export class AuditLog implements Reporter {
  private readonly raised: CombineWarning[] = [];

  private constructor(
    readonly logPath: string,
    private readonly echoWarnings: boolean
  ) {}

  static async open(logPath: string, options: AuditLogOptions = {}): Promise<AuditLog> {
    try {
      await ensureDir(path.dirname(logPath));
    } catch (error) {
      throw new IOError(`Unable to create log directory for ${logPath}`, logPath, { cause: error });
    }
    return new AuditLog(logPath, options.echoWarnings ?? true);
  }

  async info(message: string): Promise<void> {
    await this.append("INFO", message);
  }

  async warn(warning: CombineWarning): Promise<void> {
    this.raised.push(warning);
    if (this.echoWarnings) {
      console.warn(`WARNING: ${warning.message}`);
    }
    await this.append("WARNING", warning.message);
  }

  async error(message: string): Promise<void> {
    await this.append("ERROR", message);
  }

  warnings(): CombineWarning[] {
    return [...this.raised];
  }

  private async append(level: LogLevel, message: string): Promise<void> {
    const entry: LogEntry = { level, message };
    try {
      await fs.appendFile(this.logPath, formatLogEntry(entry) + "\n", "utf8");
    } catch (error) {
      throw new IOError(`Unable to write to log ${this.logPath}`, this.logPath, { cause: error });
    }
  }
}
