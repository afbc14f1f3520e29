import { describe, expect, it } from "vitest";
import { compareNatural, comparePathsNatural } from "../src/utils/sort";

describe("natural ordering", () => {
  it("compares digit runs by value", () => {
    const names = ["run-10_bold", "run-2_bold", "run-1_bold", "run-01_bold"];
    expect([...names].sort(compareNatural)).toEqual(["run-1_bold", "run-01_bold", "run-2_bold", "run-10_bold"]);
  });

  it("falls back to code unit order for text", () => {
    expect(compareNatural("dir-AP_epi", "epi")).toBeLessThan(0);
    expect(compareNatural("T1w", "T2w")).toBeLessThan(0);
    expect(compareNatural("bold", "bold")).toBe(0);
  });

  it("orders paths segment by segment", () => {
    const paths = [
      ["sub-X", "ses-10", "anat", "a_T1w.nii.gz"],
      ["sub-X", "ses-9", "func", "a_bold.nii.gz"],
      ["sub-X", "ses-9", "anat", "a_T1w.nii.gz"]
    ];
    expect([...paths].sort(comparePathsNatural).map((segments) => segments.slice(1, 3).join("/"))).toEqual([
      "ses-9/anat",
      "ses-9/func",
      "ses-10/anat"
    ]);
  });
});
