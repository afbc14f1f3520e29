import { CatalogProvider } from "../catalog/provider";
import { DataAbsentError } from "../errors";
import { DATA_EXTENSION } from "../io/paths";
import { Reporter } from "../report/reporter";
import { SessionSelection } from "../selection/sessions";
import { SourceFile } from "../types/sourceFile";

export interface CollectedFiles {
  t1w: SourceFile[];
  t2w: SourceFile[];
  /** One entry per task found across the combined sessions, possibly empty. */
  funcs: Map<string, SourceFile[]>;
  fmaps: SourceFile[];
}

function sessionLabels(sessions: readonly string[]): string {
  return sessions.map((session) => `ses-${session}`).join(", ");
}

/**
 * Walks sessions in selection order and buckets matching data files. Within a
 * bucket, files keep (session order, catalog order); nothing is re-sorted.
 */
export async function collectFiles(
  catalog: CatalogProvider,
  subject: string,
  selection: SessionSelection,
  reporter: Reporter
): Promise<CollectedFiles> {
  const tasks = [...catalog.tasks(subject, selection.sessions)].sort();
  const collected: CollectedFiles = {
    t1w: [],
    t2w: [],
    funcs: new Map(tasks.map((task): [string, SourceFile[]] => [task, []])),
    fmaps: []
  };

  for (const session of selection.sessions) {
    const base = { subject, session, extension: DATA_EXTENSION };

    if (selection.t1wSessions.includes(session)) {
      collected.t1w.push(...catalog.files({ ...base, datatype: "anat", suffix: "T1w" }));
    }
    if (selection.t2wSessions.includes(session)) {
      collected.t2w.push(...catalog.files({ ...base, datatype: "anat", suffix: "T2w" }));
    }

    collected.fmaps.push(...catalog.files({ ...base, datatype: "fmap" }));

    for (const [task, files] of collected.funcs) {
      files.push(...catalog.files({ ...base, datatype: "func", task }));
    }
  }

  if (collected.t1w.length === 0) {
    throw new DataAbsentError(
      `No T1w data were found for sub-${subject} in session(s) ${sessionLabels(selection.t1wSessions)}`
    );
  }
  if (collected.t2w.length === 0) {
    throw new DataAbsentError(
      `No T2w data were found for sub-${subject} in session(s) ${sessionLabels(selection.t2wSessions)}`
    );
  }

  const funcCount = [...collected.funcs.values()].reduce((sum, files) => sum + files.length, 0);
  if (funcCount === 0) {
    await reporter.warn({
      code: "NO_FUNCTIONAL_DATA",
      message: `Subject sub-${subject} has only anatomical data.`
    });
  }
  if (collected.fmaps.length === 0) {
    await reporter.warn({
      code: "NO_FIELDMAP_DATA",
      message: `No fmap data were found for subject sub-${subject}.`
    });
  }

  await reporter.info(
    `Collected ${collected.t1w.length} T1w, ${collected.t2w.length} T2w, ` +
      `${funcCount} functional (${tasks.length} task(s)) and ${collected.fmaps.length} fmap file(s).`
  );

  return collected;
}
