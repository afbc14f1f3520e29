import { ConfigurationError } from "../errors";

export interface SessionSelectionInput {
  subject: string;
  available: ReadonlySet<string>;
  sessionList?: readonly string[];
  t1SessionLabel?: string;
  t2SessionLabel?: string;
}

export interface SessionSelection {
  /** Order here drives run numbering in every category. */
  sessions: string[];
  t1wSessions: string[];
  t2wSessions: string[];
}

function compareLabels(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function resolveSessionOrder(input: SessionSelectionInput): string[] {
  if (input.sessionList && input.sessionList.length > 0) {
    const seen = new Set<string>();
    for (const session of input.sessionList) {
      if (seen.has(session)) {
        throw new ConfigurationError(`session ses-${session} is listed more than once`);
      }
      seen.add(session);
      if (!input.available.has(session)) {
        throw new ConfigurationError(
          `unknown session requested: subject sub-${input.subject} does not have session ses-${session}`
        );
      }
    }
    return [...input.sessionList];
  }
  return [...input.available].sort(compareLabels);
}

function resolveAnatomicalSessions(
  modality: "T1w" | "T2w",
  override: string | undefined,
  sessions: string[]
): string[] {
  if (override === undefined) return [...sessions];
  if (!sessions.includes(override)) {
    throw new ConfigurationError(
      `session for ${modality}s (ses-${override}) is not in the list of sessions to be combined`
    );
  }
  return [override];
}

export function selectSessions(input: SessionSelectionInput): SessionSelection {
  const sessions = resolveSessionOrder(input);
  return {
    sessions,
    t1wSessions: resolveAnatomicalSessions("T1w", input.t1SessionLabel, sessions),
    t2wSessions: resolveAnatomicalSessions("T2w", input.t2SessionLabel, sessions)
  };
}
