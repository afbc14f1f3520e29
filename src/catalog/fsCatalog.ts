import { promises as fs } from "fs";
import path from "path";
import { parseBidsFilename } from "../bids/filename";
import { ConfigurationError } from "../errors";
import { FileQuery, SourceFile } from "../types/sourceFile";
import { isDirectory, walkFiles } from "../utils/fs";
import { comparePathsNatural } from "../utils/sort";
import { CatalogProvider } from "./provider";

function normalizeExtension(extension: string): string {
  return extension.startsWith(".") ? extension : `.${extension}`;
}

function labelOf(dirName: string, prefix: string): string | null {
  return dirName.startsWith(prefix) ? dirName.slice(prefix.length) : null;
}

// Accepts sub-<label>/<datatype>/<file> and sub-<label>/ses-<label>/<datatype>/<file>.
function toSourceFile(root: string, parts: readonly string[]): SourceFile | null {
  if (parts.length !== 3 && parts.length !== 4) return null;

  const subject = labelOf(parts[0], "sub-");
  const session = parts.length === 4 ? labelOf(parts[1], "ses-") : null;
  if (subject === null || (parts.length === 4 && session === null)) return null;

  const filename = parts[parts.length - 1];
  const parsed = parseBidsFilename(filename);
  if (!parsed) return null;

  const entities: Record<string, string> = Object.fromEntries(parsed.entities);
  if (entities.sub !== subject) return null;
  if ((entities.ses ?? null) !== session) return null;

  return {
    path: path.join(root, ...parts),
    filename,
    relativePath: path.join(...parts),
    datatype: parts[parts.length - 2],
    entities: { ...entities, suffix: parsed.suffix, extension: parsed.extension }
  };
}

/** Catalog built from a single walk over the `sub-*` directories of a dataset root. */
export class FsCatalog implements CatalogProvider {
  private constructor(
    readonly root: string,
    private readonly entries: readonly SourceFile[]
  ) {}

  static async open(datasetRoot: string): Promise<FsCatalog> {
    const root = path.resolve(datasetRoot);
    if (!(await isDirectory(root))) {
      throw new ConfigurationError(`${datasetRoot} is not a directory`);
    }

    const located: string[][] = [];
    const topLevel = await fs.readdir(root, { withFileTypes: true });
    for (const entry of topLevel) {
      if (!entry.isDirectory() || !entry.name.startsWith("sub-")) continue;
      const files = await walkFiles(path.join(root, entry.name), {
        maxDepth: 2,
        accept: (fileName) => parseBidsFilename(fileName) !== null
      });
      located.push(...files.map((segments) => [entry.name, ...segments]));
    }

    // Natural order keeps unpadded runs in acquisition order (run-2 before run-10).
    located.sort(comparePathsNatural);
    const entries = located
      .map((parts) => toSourceFile(root, parts))
      .filter((entry): entry is SourceFile => entry !== null);
    return new FsCatalog(root, entries);
  }

  subjects(): ReadonlySet<string> {
    return new Set(this.entries.map((entry) => entry.entities.sub));
  }

  sessions(subject: string): ReadonlySet<string> {
    const sessions = new Set<string>();
    for (const entry of this.entries) {
      if (entry.entities.sub === subject && entry.entities.ses !== undefined) {
        sessions.add(entry.entities.ses);
      }
    }
    return sessions;
  }

  tasks(subject: string, sessions: readonly string[]): ReadonlySet<string> {
    const tasks = new Set<string>();
    for (const entry of this.entries) {
      const { sub, ses, task } = entry.entities;
      if (sub !== subject || ses === undefined || !sessions.includes(ses)) continue;
      if (task !== undefined) tasks.add(task);
    }
    return tasks;
  }

  files(query: FileQuery): SourceFile[] {
    const extension = normalizeExtension(query.extension);
    return this.entries.filter((entry) => {
      const { sub, ses, suffix, task } = entry.entities;
      if (sub !== query.subject || ses !== query.session) return false;
      if (entry.datatype !== query.datatype) return false;
      if (entry.entities.extension !== extension) return false;
      if (query.suffix !== undefined && suffix !== query.suffix) return false;
      if (query.task !== undefined && task !== query.task) return false;
      return true;
    });
  }
}
