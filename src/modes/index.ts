export { resolveMode, type ResolvedRun } from "./resolver.js";
