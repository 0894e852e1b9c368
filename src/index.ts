export { loadConfig, loadConfigOrDefaults, writeDefaultConfig } from "./config/loader.js";
export type { FolderDestinationConfig, DestinationEntry } from "./config/types.js";
export { Logger, RecordingConsole, type Console } from "./console/index.js";
export {
    FolderDestination,
    FolderWriter,
    resolveDestination,
    deleteRecursively,
    copyRecursively,
    matches,
    type TransformResult,
    type WriteOutcome,
    type WriterState,
} from "./folder/index.js";
export { format, validateFormat, type FormatResult } from "./format/index.js";
export {
    createCoreModule,
    createFolderModule,
    type CoreModule,
    type FolderModule,
    type FolderOptions,
    type Destination,
} from "./modules/index.js";
export {
    FolderDestinationError,
    DestinationConflict,
    IOFailure,
    FormatValidationError,
    ConfigError,
    UnsupportedOperation,
    type ErrorCode,
} from "./errors.js";
