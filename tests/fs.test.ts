import { promises as fs } from "fs";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { parseBidsFilename } from "../src/bids/filename";
import { walkFiles, writeSidecarJson } from "../src/utils/fs";
import { makeTempDir, removeDir } from "./helpers/dataset";

let tmp: string | undefined;

afterEach(async () => {
  if (tmp) await removeDir(tmp);
  tmp = undefined;
});

async function touch(root: string, relativePath: string): Promise<void> {
  const target = path.join(root, relativePath);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, "", "utf8");
}

describe("walkFiles", () => {
  it("returns only accepted files within the depth limit", async () => {
    tmp = await makeTempDir();
    await touch(tmp, "ses-01/anat/sub-X_ses-01_T1w.nii.gz");
    await touch(tmp, "ses-01/anat/notes.txt");
    await touch(tmp, "ses-01/anat/extra/sub-X_ses-01_T2w.nii.gz");
    await touch(tmp, "sub-X_scans.tsv");

    const found = await walkFiles(tmp, {
      maxDepth: 2,
      accept: (fileName) => parseBidsFilename(fileName) !== null
    });

    expect(found.map((segments) => segments.join("/")).sort()).toEqual([
      "ses-01/anat/sub-X_ses-01_T1w.nii.gz",
      "sub-X_scans.tsv"
    ]);
  });
});

describe("writeSidecarJson", () => {
  it("writes two-space indented JSON", async () => {
    tmp = await makeTempDir();
    const target = path.join(tmp, "sub-X_run-01_T1w.json");

    await writeSidecarJson(target, { RepetitionTime: 2 });

    expect(await fs.readFile(target, "utf8")).toBe('{\n  "RepetitionTime": 2\n}');
  });
});
