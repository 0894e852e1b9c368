/**
 * Per-configuration destination settings.
 */
export interface DestinationEntry {
    /** Configuration name, matched against --name */
    name: string;
    /** Fixed output folder; absolute, or relative to the working directory */
    folderDir?: string;
    /** Glob patterns, relative to the destination, to preserve across writes */
    exclude: string[];
}

/**
 * Top-level configuration (maps to .folder-destination.yml).
 */
export interface FolderDestinationConfig {
    /** Root for generated folders, relative to the working directory */
    defaultRoot: string;
    /** Write through a staging folder swapped in with a rename */
    atomicWrites: boolean;
    /** Maximum size of a single log file in MB before rotation (default: 10) */
    maxLogSizeMB: number;
    /** Maximum number of rotated log files to keep (default: 5) */
    maxLogFiles: number;
    /** Directory for log files; defaults to ~/.folder-destination/logs */
    logDir?: string;
    destinations: DestinationEntry[];
}

/** Default configuration values */
export const CONFIG_DEFAULTS = {
    defaultRoot: "copybara/out",
    atomicWrites: false,
    maxLogSizeMB: 10,
    maxLogFiles: 5,
    configFileName: ".folder-destination.yml",
} as const;
