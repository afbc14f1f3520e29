import { FileQuery, SourceFile } from "../types/sourceFile";

/**
 * Read-only view over one dataset. Queries must not have side effects, and
 * `files` returns one session's matches in the catalog's own order, which
 * callers keep as-is.
 */
export interface CatalogProvider {
  readonly root: string;
  subjects(): ReadonlySet<string>;
  sessions(subject: string): ReadonlySet<string>;
  tasks(subject: string, sessions: readonly string[]): ReadonlySet<string>;
  files(query: FileQuery): SourceFile[];
}
