export {
    loadConfig,
    loadConfigOrDefaults,
    writeDefaultConfig,
    validateConfig,
    findDestination,
    getConfigHome,
} from "./loader.js";
export type { FolderDestinationConfig, DestinationEntry } from "./types.js";
export { CONFIG_DEFAULTS } from "./types.js";
