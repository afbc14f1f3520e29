import { promises as fs, Stats } from "fs";
import path from "path";

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

async function statOrNull(target: string): Promise<Stats | null> {
  try {
    return await fs.stat(target);
  } catch {
    return null;
  }
}

export async function pathExists(target: string): Promise<boolean> {
  return (await statOrNull(target)) !== null;
}

export async function isDirectory(target: string): Promise<boolean> {
  return (await statOrNull(target))?.isDirectory() ?? false;
}

/** Two-space indented JSON, written into a directory that must already exist. */
export async function writeSidecarJson(filePath: string, data: Record<string, unknown>): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
}

/** Changes only the group; -1 leaves the owning user untouched. */
export async function chownGroup(targetPath: string, gid: number): Promise<void> {
  await fs.chown(targetPath, -1, gid);
}

export interface WalkOptions {
  /** Directory levels below the start directory to descend into. */
  maxDepth: number;
  accept: (fileName: string) => boolean;
}

/** Accepted files under `startDir`, as path segments relative to it. */
export async function walkFiles(startDir: string, options: WalkOptions): Promise<string[][]> {
  const results: string[][] = [];
  async function walk(segments: string[]): Promise<void> {
    const entries = await fs.readdir(path.join(startDir, ...segments), { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory()) {
        if (segments.length < options.maxDepth) await walk([...segments, entry.name]);
      } else if (entry.isFile() && options.accept(entry.name)) {
        results.push([...segments, entry.name]);
      }
    }
  }
  await walk([]);
  return results;
}
