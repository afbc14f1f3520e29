export type BidsEntity = readonly [key: string, value: string];

export interface BidsFilename {
  entities: readonly BidsEntity[];
  suffix: string;
  extension: string;
}

// BIDS entity table order. Anything not listed sorts after these.
export const CANONICAL_ENTITY_ORDER: readonly string[] = [
  "sub",
  "ses",
  "task",
  "acq",
  "ce",
  "trc",
  "stain",
  "rec",
  "dir",
  "run",
  "mod",
  "echo",
  "flip",
  "inv",
  "mt",
  "part",
  "proc",
  "hemi",
  "space",
  "split",
  "recording",
  "chunk",
  "res",
  "den",
  "label",
  "desc"
];

const ENTITY_PATTERN = /^([a-zA-Z]+)-([a-zA-Z0-9]+)$/;
const SUFFIX_PATTERN = /^[a-zA-Z0-9]+$/;

function splitExtension(lastSegment: string): { suffix: string; extension: string } {
  const dot = lastSegment.indexOf(".");
  if (dot < 0) return { suffix: lastSegment, extension: "" };
  return { suffix: lastSegment.slice(0, dot), extension: lastSegment.slice(dot) };
}

export function parseBidsFilename(filename: string): BidsFilename | null {
  const segments = filename.split("_");
  if (segments.length < 2) return null;

  const last = segments[segments.length - 1];
  const { suffix, extension } = splitExtension(last);
  if (!SUFFIX_PATTERN.test(suffix)) return null;

  const entities: BidsEntity[] = [];
  const seen = new Set<string>();
  for (const segment of segments.slice(0, -1)) {
    const match = segment.match(ENTITY_PATTERN);
    if (!match) return null;
    const [, key, value] = match;
    if (seen.has(key)) return null;
    seen.add(key);
    entities.push([key, value]);
  }

  return { entities, suffix, extension };
}

function entityRank(key: string): number {
  const index = CANONICAL_ENTITY_ORDER.indexOf(key);
  return index >= 0 ? index : CANONICAL_ENTITY_ORDER.length;
}

export function formatBidsFilename(parsed: BidsFilename): string {
  // Array.prototype.sort is stable, so unknown entities keep their relative order.
  const ordered = [...parsed.entities].sort((a, b) => entityRank(a[0]) - entityRank(b[0]));
  const parts = ordered.map(([key, value]) => `${key}-${value}`);
  parts.push(parsed.suffix);
  return parts.join("_") + parsed.extension;
}

export function getEntity(parsed: BidsFilename, key: string): string | undefined {
  return parsed.entities.find(([name]) => name === key)?.[1];
}

export function withEntity(parsed: BidsFilename, key: string, value: string): BidsFilename {
  const exists = parsed.entities.some(([name]) => name === key);
  const entities: BidsEntity[] = exists
    ? parsed.entities.map(([name, current]) => [name, name === key ? value : current] as const)
    : [...parsed.entities, [key, value] as const];
  return { ...parsed, entities };
}

export function withoutEntity(parsed: BidsFilename, key: string): BidsFilename {
  return { ...parsed, entities: parsed.entities.filter(([name]) => name !== key) };
}

export function formatRunLabel(run: number, width: number): string {
  return String(run).padStart(width, "0");
}

export function replaceExtension(filename: string, from: string, to: string): string {
  if (!filename.endsWith(from)) {
    throw new Error(`${filename} does not end with ${from}`);
  }
  return filename.slice(0, filename.length - from.length) + to;
}
