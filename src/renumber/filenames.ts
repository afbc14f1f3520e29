import {
  formatBidsFilename,
  formatRunLabel,
  parseBidsFilename,
  withEntity,
  withoutEntity
} from "../bids/filename";
import { ConfigurationError } from "../errors";

export const ANAT_RUN_WIDTH = 2;
export const FMAP_RUN_WIDTH = 2;

// More than 100 runs of one task need a third digit; decided per task.
export function functionalRunWidth(fileCount: number): number {
  return fileCount > 100 ? 3 : 2;
}

/**
 * Drops the session entity and sets the run entity, replacing an existing run
 * or adding one when the source omitted it. Output is in canonical entity order.
 */
export function combinedSessionFilename(filename: string, run: number, width: number): string {
  const parsed = parseBidsFilename(filename);
  if (!parsed) {
    throw new ConfigurationError(`Cannot renumber ${filename}: not a BIDS entity filename`);
  }
  const renamed = withEntity(withoutEntity(parsed, "ses"), "run", formatRunLabel(run, width));
  return formatBidsFilename(renamed);
}
