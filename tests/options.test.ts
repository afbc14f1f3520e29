import { promises as fs } from "fs";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import {
  groupFileLookup,
  lookupGroupId,
  parseCombineOptions,
  resolveGroupId,
  systemGroupLookup
} from "../src/config/options";
import { ConfigurationError } from "../src/errors";
import { makeTempDir, removeDir } from "./helpers/dataset";

const GROUPS = ["root:x:0:", "# comment", "neuro:x:1204:alice,bob", "broken:x:abc:", ""].join("\n");

describe("combine options", () => {
  it("fills in defaults", () => {
    expect(parseCombineOptions({ datasetRoot: "/data/study", subjectLabel: "01" })).toEqual({
      datasetRoot: "/data/study",
      subjectLabel: "01",
      sessionList: [],
      datasetName: "combined"
    });
  });

  it("reports every invalid field", () => {
    expect(() =>
      parseCombineOptions({
        datasetRoot: "",
        subjectLabel: "01",
        sessionList: ["ses-01"],
        datasetName: "my data"
      })
    ).toThrow(
      new ConfigurationError(
        "Invalid options: datasetRoot: dataset root is required; " +
          "sessionList.0: session label must be alphanumeric (without the BIDS prefix); " +
          "datasetName: dataset name must be alphanumeric (without the BIDS prefix)"
      )
    );
  });
});

describe("owner group resolution", () => {
  let tmp: string | null = null;

  afterEach(async () => {
    if (tmp) await removeDir(tmp);
    tmp = null;
  });

  it("looks up group names", () => {
    expect(lookupGroupId(GROUPS, "neuro")).toBe(1204);
    expect(lookupGroupId(GROUPS, "root")).toBe(0);
    expect(lookupGroupId(GROUPS, "broken")).toBeNull();
    expect(lookupGroupId(GROUPS, "missing")).toBeNull();
  });

  it("accepts numeric ids without a lookup", async () => {
    const lookup = async (): Promise<number | null> => {
      throw new Error("lookup should not run");
    };
    await expect(resolveGroupId("1204", lookup)).resolves.toBe(1204);
  });

  it("resolves names through the injected lookup", async () => {
    const directory = new Map([["ldapgroup", 52001]]);
    const lookup = async (name: string) => directory.get(name) ?? null;

    await expect(resolveGroupId("ldapgroup", lookup)).resolves.toBe(52001);
    await expect(resolveGroupId("nobody", lookup)).rejects.toThrow("Unknown owner group: nobody");
  });

  it("reads names from a group file", async () => {
    tmp = await makeTempDir();
    const groupFile = path.join(tmp, "group");
    await fs.writeFile(groupFile, GROUPS, "utf8");

    await expect(groupFileLookup(groupFile)("neuro")).resolves.toBe(1204);
    await expect(groupFileLookup(groupFile)("nobody")).resolves.toBeNull();
  });

  it("fails when the group file cannot be read", async () => {
    await expect(groupFileLookup("/nonexistent/group")("neuro")).rejects.toThrow(ConfigurationError);
  });

  it("resolves system groups through the group database", async () => {
    const fallback = groupFileLookup("/etc/group");
    await expect(systemGroupLookup(fallback)("root")).resolves.toBe(0);
    await expect(systemGroupLookup(fallback)("nosuchgroupzz")).resolves.toBeNull();
  });
});
