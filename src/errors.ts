export type ErrorCategory = "configuration" | "data_absent" | "metadata" | "io";

export class CombineError extends Error {
  readonly category: ErrorCategory;

  constructor(message: string, category: ErrorCategory, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CombineError";
    this.category = category;
  }
}

/** Bad CLI input or session selection; the user has to fix the invocation. */
export class ConfigurationError extends CombineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "configuration", options);
    this.name = "ConfigurationError";
  }
}

/** A mandatory anatomical modality is missing from the contributing sessions. */
export class DataAbsentError extends CombineError {
  constructor(message: string) {
    super(message, "data_absent");
    this.name = "DataAbsentError";
  }
}

export class MetadataError extends CombineError {
  readonly metadataPath: string;

  constructor(message: string, metadataPath: string, options?: { cause?: unknown }) {
    super(message, "metadata", options);
    this.name = "MetadataError";
    this.metadataPath = metadataPath;
  }
}

export class IOError extends CombineError {
  readonly targetPath: string;

  constructor(message: string, targetPath: string, options?: { cause?: unknown }) {
    super(message, "io", options);
    this.name = "IOError";
    this.targetPath = targetPath;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof CombineError) return `${error.name}: ${error.message}`;
  if (error instanceof Error) return error.message;
  return String(error);
}
