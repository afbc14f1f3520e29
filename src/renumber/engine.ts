import { CollectedFiles } from "../collect/collector";
import { ConfigurationError } from "../errors";
import { RenamePlan, RunCategory } from "../types/renamePlan";
import { Datatype, SourceFile } from "../types/sourceFile";
import { CombineWarning } from "../types/warnings";
import { classifyFieldMap, DirectionGroup } from "./fieldmaps";
import {
  ANAT_RUN_WIDTH,
  FMAP_RUN_WIDTH,
  combinedSessionFilename,
  functionalRunWidth
} from "./filenames";

export interface RenumberResult {
  plans: RenamePlan[];
  warnings: CombineWarning[];
}

function numberGroup(
  files: readonly SourceFile[],
  datatype: Datatype,
  category: RunCategory,
  width: number,
  task: string | null = null
): RenamePlan[] {
  return files.map((source, index) => {
    const run = index + 1;
    return {
      source,
      datatype,
      category,
      task,
      run,
      destinationFilename: combinedSessionFilename(source.filename, run, width)
    };
  });
}

export function renumberAnatomical(files: readonly SourceFile[], modality: "T1w" | "T2w"): RenamePlan[] {
  return numberGroup(files, "anat", modality, ANAT_RUN_WIDTH);
}

export function renumberFunctional(task: string, files: readonly SourceFile[]): RenamePlan[] {
  return numberGroup(files, "func", "func", functionalRunWidth(files.length), task);
}

const FMAP_CATEGORY: Record<DirectionGroup, RunCategory> = {
  AP: "fmap_AP",
  PA: "fmap_PA",
  generic: "fmap_generic"
};

/**
 * Field maps are split by phase-encoding direction and each direction is
 * numbered on its own. Plans come back in input order, not grouped.
 */
export function renumberFieldMaps(files: readonly SourceFile[]): RenumberResult {
  const counters: Record<DirectionGroup, number> = { AP: 0, PA: 0, generic: 0 };
  const plans: RenamePlan[] = [];
  const warnings: CombineWarning[] = [];

  for (const source of files) {
    const { group, unrecognized } = classifyFieldMap(source);
    if (unrecognized !== null) {
      warnings.push({
        code: "UNRECOGNIZED_DIRECTION",
        message: `Direction "${unrecognized}" was not recognized (${source.filename}); numbered with the generic field maps.`
      });
    }
    counters[group] += 1;
    const run = counters[group];
    plans.push({
      source,
      datatype: "fmap",
      category: FMAP_CATEGORY[group],
      task: null,
      run,
      destinationFilename: combinedSessionFilename(source.filename, run, FMAP_RUN_WIDTH)
    });
  }

  return { plans, warnings };
}

export function assertUniqueDestinations(plans: readonly RenamePlan[]): void {
  const seen = new Map<string, SourceFile>();
  for (const plan of plans) {
    const key = `${plan.datatype}/${plan.destinationFilename}`;
    const previous = seen.get(key);
    if (previous) {
      throw new ConfigurationError(
        `${previous.relativePath} and ${plan.source.relativePath} would both be written to ${key}`
      );
    }
    seen.set(key, plan.source);
  }
}

export function renumber(collected: CollectedFiles): RenumberResult {
  const fieldMaps = renumberFieldMaps(collected.fmaps);
  const plans: RenamePlan[] = [
    ...renumberAnatomical(collected.t1w, "T1w"),
    ...renumberAnatomical(collected.t2w, "T2w")
  ];
  for (const [task, files] of collected.funcs) {
    plans.push(...renumberFunctional(task, files));
  }
  plans.push(...fieldMaps.plans);

  assertUniqueDestinations(plans);
  return { plans, warnings: fieldMaps.warnings };
}
