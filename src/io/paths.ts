import path from "path";
import { Datatype } from "../types/sourceFile";

export const DATA_EXTENSION = ".nii.gz";
export const METADATA_EXTENSION = ".json";
export const AUDIT_LOG_NAME = "README";

export function outputRoot(datasetRoot: string, datasetName: string): string {
  return path.resolve(datasetRoot, "..", `niftis_desc-${datasetName}`);
}

export function subjectDir(datasetRoot: string, datasetName: string, subject: string): string {
  return path.join(outputRoot(datasetRoot, datasetName), `sub-${subject}`);
}

export function datatypeDir(subjectOutDir: string, datatype: Datatype): string {
  return path.join(subjectOutDir, datatype);
}

export function auditLogPath(subjectOutDir: string): string {
  return path.join(subjectOutDir, AUDIT_LOG_NAME);
}
