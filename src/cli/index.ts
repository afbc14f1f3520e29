#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { runCombineCommand } from "../commands/combine";
import { describeError } from "../errors";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.SESSION_COMBINER_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(__dirname, "..", "..", ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const program = new Command();

program
  .name("combine-sessions")
  .description(
    "Combine all sessions of one BIDS subject into a single session, renumbering runs " +
      "and recording each file's origin in the SourceFile field of its sidecar."
  )
  .version(pkg.version)
  .argument("<dataset_root>", "Path to the input BIDS dataset")
  .argument("<subject_label>", 'Subject to combine, without the "sub-" prefix')
  .option(
    "--session-list <label...>",
    "Sessions to combine, in the order their runs are numbered (default: all, sorted by label)"
  )
  .option("--t1-session-label <label>", "Only take T1w data from this session")
  .option("--t2-session-label <label>", "Only take T2w data from this session")
  .option(
    "--dataset-name <name>",
    'Replaces "combined" in the niftis_desc-<name> output directory',
    process.env.SESSION_COMBINER_DATASET_NAME ?? "combined"
  )
  .option(
    "--owner-group <group>",
    "Group name or id to own the new directories and files",
    process.env.SESSION_COMBINER_OWNER_GROUP
  )
  .option(
    "--env-file <path>",
    "Path to .env file (overrides SESSION_COMBINER_ENV_FILE/DOTENV_CONFIG_PATH)",
    envPath
  )
  .action(async (datasetRoot: string, subjectLabel: string, opts) => {
    await runCombineCommand({
      datasetRoot,
      subjectLabel,
      sessionList: opts.sessionList,
      t1SessionLabel: opts.t1SessionLabel,
      t2SessionLabel: opts.t2SessionLabel,
      datasetName: opts.datasetName,
      ownerGroup: opts.ownerGroup
    });
  });

program.parseAsync().catch((error) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
