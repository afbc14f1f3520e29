import { promises as fs } from "fs";
import path from "path";
import { replaceExtension } from "../bids/filename";
import { IOError, MetadataError } from "../errors";
import { DATA_EXTENSION, METADATA_EXTENSION, datatypeDir } from "../io/paths";
import { Reporter } from "../report/reporter";
import { OutputFilePair, RenamePlan } from "../types/renamePlan";
import { Datatype, SourceFile } from "../types/sourceFile";
import { chownGroup, ensureDir, pathExists, writeSidecarJson } from "../utils/fs";
import {
  INTENDED_FOR_FIELD,
  PROVENANCE_FIELD,
  SidecarMetadata,
  SidecarMetadataSchema
} from "../validation/metadataSchema";

export interface MaterializerOptions {
  subjectOutDir: string;
  /** Group to own every created directory and file; null leaves ownership alone. */
  gid: number | null;
  reporter: Reporter;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function metadataPathFor(dataPath: string): string {
  return path.join(
    path.dirname(dataPath),
    replaceExtension(path.basename(dataPath), DATA_EXTENSION, METADATA_EXTENSION)
  );
}

export async function readSidecar(metadataPath: string): Promise<SidecarMetadata> {
  let raw: string;
  try {
    raw = await fs.readFile(metadataPath, "utf8");
  } catch (error) {
    const reason = errorCode(error) === "ENOENT" ? "is missing" : "could not be read";
    throw new MetadataError(`Metadata ${metadataPath} ${reason}`, metadataPath, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new MetadataError(`Metadata ${metadataPath} is not valid JSON`, metadataPath, { cause: error });
  }

  const parsed = SidecarMetadataSchema.safeParse(data);
  if (!parsed.success) {
    throw new MetadataError(`Metadata ${metadataPath} is not a JSON object`, metadataPath);
  }
  return parsed.data;
}

/**
 * Copies data files and their sidecars into the combined subject tree, one at
 * a time. Failures propagate immediately; nothing already written is removed.
 */
export class Materializer {
  private readonly preparedDirs = new Set<string>();

  constructor(private readonly options: MaterializerOptions) {}

  async applyGroup(targetPath: string): Promise<void> {
    if (this.options.gid === null) return;
    try {
      await chownGroup(targetPath, this.options.gid);
    } catch (error) {
      throw new IOError(
        `Unable to change group of ${targetPath} to ${this.options.gid}`,
        targetPath,
        { cause: error }
      );
    }
  }

  /** Creates a datatype directory the first time a file is destined for it. */
  async prepareDir(datatype: Datatype): Promise<string> {
    const dir = datatypeDir(this.options.subjectOutDir, datatype);
    if (this.preparedDirs.has(dir)) return dir;
    try {
      await ensureDir(dir);
    } catch (error) {
      throw new IOError(`Unable to create directory ${dir}`, dir, { cause: error });
    }
    await this.applyGroup(dir);
    this.preparedDirs.add(dir);
    return dir;
  }

  async materializePlan(plan: RenamePlan): Promise<OutputFilePair> {
    const destDir = await this.prepareDir(plan.datatype);
    return this.materializeFile(plan.source, destDir, plan.destinationFilename);
  }

  async materializeFile(source: SourceFile, destDir: string, destFilename: string): Promise<OutputFilePair> {
    const { reporter } = this.options;
    const dataPath = path.join(destDir, destFilename);
    const sourceMetadataPath = metadataPathFor(source.path);
    const metadataPath = metadataPathFor(dataPath);

    // Sidecar is validated before the copy so a bad one leaves no orphan data file.
    const metadata = await readSidecar(sourceMetadataPath);

    if (await pathExists(dataPath)) {
      await reporter.info(`Overwriting existing file ${dataPath}`);
    }

    try {
      await fs.copyFile(source.path, dataPath);
    } catch (error) {
      throw new IOError(`Unable to copy ${source.path} to ${dataPath}`, dataPath, { cause: error });
    }
    await reporter.info(source.path);
    await reporter.info(`  -------> ${dataPath}`);

    const output: SidecarMetadata = { ...metadata, [PROVENANCE_FIELD]: source.path };
    try {
      await writeSidecarJson(metadataPath, output);
    } catch (error) {
      throw new IOError(`Unable to write ${metadataPath}`, metadataPath, { cause: error });
    }
    await reporter.info(sourceMetadataPath);
    await reporter.info(`  -------> ${metadataPath}`);

    if (source.datatype === "fmap" && INTENDED_FOR_FIELD in metadata) {
      await reporter.warn({
        code: "INTENDED_FOR_NOT_REWRITTEN",
        message: `${INTENDED_FOR_FIELD} in ${metadataPath} still points at the original session paths.`
      });
    }

    await this.applyGroup(dataPath);
    await this.applyGroup(metadataPath);

    return { source, dataPath, metadataPath, sourceMetadataPath };
  }
}
