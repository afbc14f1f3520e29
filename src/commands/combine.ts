import path from "path";
import { CatalogProvider } from "../catalog/provider";
import { FsCatalog } from "../catalog/fsCatalog";
import { collectFiles } from "../collect/collector";
import {
  CombineOptions,
  CombineOptionsInput,
  GroupLookup,
  parseCombineOptions,
  resolveGroupId
} from "../config/options";
import { ConfigurationError, describeError } from "../errors";
import { auditLogPath, outputRoot, subjectDir } from "../io/paths";
import { Materializer } from "../materialize/materializer";
import { renumber } from "../renumber/engine";
import { AuditLog } from "../report/auditLog";
import { Reporter } from "../report/reporter";
import { selectSessions } from "../selection/sessions";
import { OutputFilePair } from "../types/renamePlan";
import { CombineWarning } from "../types/warnings";

export interface CombineDependencies {
  openCatalog?: (datasetRoot: string) => Promise<CatalogProvider>;
  openReporter?: (logPath: string) => Promise<Reporter>;
  lookupGroup?: GroupLookup;
}

export interface CombineSuccess {
  status: "success";
  subjectDir: string;
  sessions: string[];
  outputs: OutputFilePair[];
  warnings: CombineWarning[];
}

export interface CombineFailure {
  status: "failure";
  error: unknown;
  warnings: CombineWarning[];
}

export type CombineOutcome = CombineSuccess | CombineFailure;

async function logInvocation(reporter: Reporter, options: CombineOptions): Promise<void> {
  await reporter.info(`Run started ${new Date().toISOString()}`);
  await reporter.info("Combine sessions was run with these values:");
  await reporter.info(`BIDS directory: ${options.datasetRoot}`);
  await reporter.info(`Participant label: ${options.subjectLabel}`);
  await reporter.info(
    `Session list: ${options.sessionList.length > 0 ? options.sessionList.join(" ") : "(all, sorted by label)"}`
  );
  await reporter.info(`T1w session label: ${options.t1SessionLabel ?? "(all)"}`);
  await reporter.info(`T2w session label: ${options.t2SessionLabel ?? "(all)"}`);
  await reporter.info(`Dataset name: ${options.datasetName}`);
  await reporter.info(`Owner group: ${options.ownerGroup ?? "(unchanged)"}`);
}

async function runPipeline(
  options: CombineOptions,
  reporter: Reporter,
  deps: CombineDependencies
): Promise<CombineSuccess> {
  const subjectOutDir = subjectDir(options.datasetRoot, options.datasetName, options.subjectLabel);
  const gid =
    options.ownerGroup === undefined
      ? null
      : await resolveGroupId(options.ownerGroup, deps.lookupGroup);
  const materializer = new Materializer({ subjectOutDir, gid, reporter });
  await materializer.applyGroup(outputRoot(options.datasetRoot, options.datasetName));
  await materializer.applyGroup(subjectOutDir);

  const openCatalog = deps.openCatalog ?? FsCatalog.open;
  const catalog = await openCatalog(options.datasetRoot);

  const subject = options.subjectLabel;
  if (!catalog.subjects().has(subject)) {
    throw new ConfigurationError(`subject ${subject} is not in the BIDS layout of directory ${catalog.root}`);
  }

  const selection = selectSessions({
    subject,
    available: catalog.sessions(subject),
    sessionList: options.sessionList,
    t1SessionLabel: options.t1SessionLabel,
    t2SessionLabel: options.t2SessionLabel
  });
  await reporter.info(`Sessions combined, in order: ${selection.sessions.join(" ")}`);
  await reporter.info(`T1w sessions: ${selection.t1wSessions.join(" ")}`);
  await reporter.info(`T2w sessions: ${selection.t2wSessions.join(" ")}`);

  const collected = await collectFiles(catalog, subject, selection, reporter);
  const { plans, warnings } = renumber(collected);
  for (const warning of warnings) {
    await reporter.warn(warning);
  }

  const outputs: OutputFilePair[] = [];
  for (const plan of plans) {
    outputs.push(await materializer.materializePlan(plan));
  }
  await reporter.info(`Wrote ${outputs.length} file pair(s) to ${subjectOutDir}`);

  return {
    status: "success",
    subjectDir: subjectOutDir,
    sessions: selection.sessions,
    outputs,
    warnings: reporter.warnings()
  };
}

/**
 * Combines every selected session of one subject into
 * `<dataset_root>/../niftis_desc-<name>/sub-<label>`. Fails fast; whatever was
 * written before a failure stays on disk and is listed in the subject README.
 */
export async function combineSessions(
  input: CombineOptionsInput,
  deps: CombineDependencies = {}
): Promise<CombineOutcome> {
  let options: CombineOptions;
  let reporter: Reporter;
  try {
    options = parseCombineOptions(input);
    const subjectOutDir = subjectDir(options.datasetRoot, options.datasetName, options.subjectLabel);
    const openReporter = deps.openReporter ?? ((logPath: string) => AuditLog.open(logPath));
    reporter = await openReporter(auditLogPath(subjectOutDir));
  } catch (error) {
    return { status: "failure", error, warnings: [] };
  }

  try {
    await logInvocation(reporter, options);
    return await runPipeline(options, reporter, deps);
  } catch (error) {
    await reporter.error(describeError(error)).catch(() => undefined);
    return { status: "failure", error, warnings: reporter.warnings() };
  }
}

export async function runCombineCommand(input: CombineOptionsInput): Promise<void> {
  const outcome = await combineSessions(input);
  if (outcome.status === "failure") {
    throw outcome.error;
  }

  const relative = path.relative(process.cwd(), outcome.subjectDir) || ".";
  console.log(
    `Combined ${outcome.sessions.length} session(s) into ${relative}: ` +
      `${outcome.outputs.length} file pair(s), ${outcome.warnings.length} warning(s).`
  );
}
