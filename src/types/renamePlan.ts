import { Datatype, SourceFile } from "./sourceFile";

export type RunCategory = "T1w" | "T2w" | "func" | "fmap_AP" | "fmap_PA" | "fmap_generic";

export interface RenamePlan {
  source: SourceFile;
  datatype: Datatype;
  category: RunCategory;
  /** Set for functional plans only. */
  task: string | null;
  run: number;
  destinationFilename: string;
}

export interface OutputFilePair {
  source: SourceFile;
  dataPath: string;
  metadataPath: string;
  sourceMetadataPath: string;
}
