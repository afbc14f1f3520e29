import { z } from "zod";

/** Sidecar metadata only has to be a JSON object; its fields are carried over untouched. */
export const SidecarMetadataSchema = z.record(z.string(), z.unknown());

export type SidecarMetadata = z.infer<typeof SidecarMetadataSchema>;

export const PROVENANCE_FIELD = "SourceFile";
export const INTENDED_FOR_FIELD = "IntendedFor";
