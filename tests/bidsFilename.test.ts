import { describe, expect, it } from "vitest";
import {
  formatBidsFilename,
  formatRunLabel,
  getEntity,
  parseBidsFilename,
  replaceExtension,
  withEntity,
  withoutEntity
} from "../src/bids/filename";

describe("BIDS filename model", () => {
  it("parses entities, suffix and a double extension", () => {
    const parsed = parseBidsFilename("sub-01_ses-A_task-rest_run-1_bold.nii.gz");
    expect(parsed).toEqual({
      entities: [
        ["sub", "01"],
        ["ses", "A"],
        ["task", "rest"],
        ["run", "1"]
      ],
      suffix: "bold",
      extension: ".nii.gz"
    });
  });

  it("rejects names that are not entity chains", () => {
    expect(parseBidsFilename("README")).toBeNull();
    expect(parseBidsFilename("dataset_description.json")).toBeNull();
    expect(parseBidsFilename("sub-01_ses-A")).toBeNull();
    expect(parseBidsFilename("sub-01_sub-02_T1w.nii.gz")).toBeNull();
  });

  it("serializes in canonical entity order", () => {
    const name = formatBidsFilename({
      entities: [
        ["sub", "01"],
        ["run", "02"],
        ["task", "rest"]
      ],
      suffix: "bold",
      extension: ".nii.gz"
    });
    expect(name).toBe("sub-01_task-rest_run-02_bold.nii.gz");
  });

  it("keeps unknown entities verbatim after the known ones", () => {
    const parsed = parseBidsFilename("sub-01_foo-x_acq-mb_bold.nii.gz");
    expect(parsed).not.toBeNull();
    if (!parsed) return;
    expect(formatBidsFilename(parsed)).toBe("sub-01_acq-mb_foo-x_bold.nii.gz");
  });

  it("sets, replaces and drops entities without mutating the input", () => {
    const parsed = parseBidsFilename("sub-01_ses-A_run-3_T1w.nii.gz");
    if (!parsed) throw new Error("parse failed");

    const replaced = withEntity(parsed, "run", "01");
    const dropped = withoutEntity(replaced, "ses");
    const added = withEntity(dropped, "acq", "mprage");

    expect(getEntity(parsed, "run")).toBe("3");
    expect(getEntity(replaced, "run")).toBe("01");
    expect(getEntity(dropped, "ses")).toBeUndefined();
    expect(formatBidsFilename(added)).toBe("sub-01_acq-mprage_run-01_T1w.nii.gz");
  });

  it("zero-pads run labels to the requested width", () => {
    expect(formatRunLabel(7, 2)).toBe("07");
    expect(formatRunLabel(5, 3)).toBe("005");
    expect(formatRunLabel(101, 3)).toBe("101");
  });

  it("swaps a trailing extension", () => {
    expect(replaceExtension("sub-01_T1w.nii.gz", ".nii.gz", ".json")).toBe("sub-01_T1w.json");
    expect(() => replaceExtension("sub-01_T1w.nii", ".nii.gz", ".json")).toThrow(
      "sub-01_T1w.nii does not end with .nii.gz"
    );
  });
});
