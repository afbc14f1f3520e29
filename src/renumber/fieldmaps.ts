import { SourceFile } from "../types/sourceFile";

export type DirectionGroup = "AP" | "PA" | "generic";

export interface DirectionClassification {
  group: DirectionGroup;
  /** Upper-cased label that was present but matched neither AP nor PA. */
  unrecognized: string | null;
}

export function classifyDirection(dir: string | undefined): DirectionClassification {
  const label = (dir ?? "").trim().toUpperCase();
  if (label === "AP" || label === "PA") return { group: label, unrecognized: null };
  return { group: "generic", unrecognized: label === "" ? null : label };
}

export function classifyFieldMap(file: SourceFile): DirectionClassification {
  return classifyDirection(file.entities.dir);
}
