export { combineSessions, runCombineCommand } from "./commands/combine";
export type { CombineDependencies, CombineOutcome } from "./commands/combine";
export { FsCatalog } from "./catalog/fsCatalog";
export type { CatalogProvider } from "./catalog/provider";
export * from "./errors";
