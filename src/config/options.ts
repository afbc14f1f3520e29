import { execFile } from "child_process";
import { promises as fs } from "fs";
import { promisify } from "util";
import { z } from "zod";
import { ConfigurationError } from "../errors";

const LABEL = /^[a-zA-Z0-9]+$/;

const labelSchema = (what: string) =>
  z.string().regex(LABEL, `${what} must be alphanumeric (without the BIDS prefix)`);

export const CombineOptionsSchema = z.object({
  datasetRoot: z.string().min(1, "dataset root is required"),
  subjectLabel: labelSchema("subject label"),
  sessionList: z.array(labelSchema("session label")).default([]),
  t1SessionLabel: labelSchema("T1w session label").optional(),
  t2SessionLabel: labelSchema("T2w session label").optional(),
  datasetName: labelSchema("dataset name").default("combined"),
  ownerGroup: z.string().min(1).optional()
});

export type CombineOptionsInput = z.input<typeof CombineOptionsSchema>;
export type CombineOptions = z.output<typeof CombineOptionsSchema>;

export function parseCombineOptions(input: unknown): CombineOptions {
  const parsed = CombineOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid options: ${details}`);
  }
  return parsed.data;
}

export const GROUP_FILE = "/etc/group";

/** Finds the gid for a group name in group(5) formatted text. */
export function lookupGroupId(groupFile: string, name: string): number | null {
  for (const line of groupFile.split("\n")) {
    const [groupName, , gid] = line.split(":");
    if (groupName === name && gid !== undefined && /^\d+$/.test(gid)) {
      return Number(gid);
    }
  }
  return null;
}

export type GroupLookup = (name: string) => Promise<number | null>;

export function groupFileLookup(groupFilePath = GROUP_FILE): GroupLookup {
  return async (name) => {
    let content: string;
    try {
      content = await fs.readFile(groupFilePath, "utf8");
    } catch (error) {
      throw new ConfigurationError(`Unable to read ${groupFilePath} to resolve group ${name}`, {
        cause: error
      });
    }
    return lookupGroupId(content, name);
  };
}

const execFileAsync = promisify(execFile);

function exitCode(error: unknown): unknown {
  return error instanceof Error && "code" in error ? error.code : undefined;
}

/**
 * Resolves through the system group database (local files, LDAP, SSSD) with
 * getent; the fallback only answers where getent cannot run.
 */
export function systemGroupLookup(fallback: GroupLookup = groupFileLookup()): GroupLookup {
  return async (name) => {
    let stdout: string;
    try {
      ({ stdout } = await execFileAsync("getent", ["group", name]));
    } catch (error) {
      // getent exits with 2 when no database knows the key.
      if (exitCode(error) === 2) return null;
      return fallback(name);
    }
    return lookupGroupId(stdout, name);
  };
}

export async function resolveGroupId(
  ownerGroup: string,
  lookup: GroupLookup = systemGroupLookup()
): Promise<number> {
  if (/^\d+$/.test(ownerGroup)) return Number(ownerGroup);

  const gid = await lookup(ownerGroup);
  if (gid === null) {
    throw new ConfigurationError(`Unknown owner group: ${ownerGroup}`);
  }
  return gid;
}
