export { matches, createPathMatcher, notMatcher, relativeToRoot, type PathMatcher } from "./path-matcher.js";
export { deleteRecursively, copyRecursively } from "./tree-ops.js";
export {
    resolveDestination,
    sanitizeConfigName,
    formatFolderTimestamp,
    DEFAULT_ROOT_RELATIVE,
    type ResolveDestinationOptions,
} from "./resolver.js";
export { stagedWrite, copyPreserved, type StagedWriteOutcome } from "./staging.js";
export {
    FolderDestination,
    FolderWriter,
    ensureDestinationDirectory,
    type TransformResult,
    type WriteOutcome,
    type WriterOptions,
    type WriterState,
} from "./writer.js";
