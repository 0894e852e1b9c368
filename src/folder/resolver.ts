import * as path from "node:path";
import type { Console } from "../console/console.js";

/** Default root for generated folders, relative to the working directory */
export const DEFAULT_ROOT_RELATIVE = path.join("copybara", "out");

export interface ResolveDestinationOptions {
    /** Explicit folder (the --folder-dir flag). Empty or absent means "generate one". */
    folderDir?: string;
    /** Logical configuration name, used to namespace generated folders */
    configName: string;
    /** Working directory relative paths resolve against */
    cwd: string;
    /** Root for generated folders (defaults to <cwd>/copybara/out) */
    defaultRoot?: string;
    clock?: () => Date;
    console?: Console;
}

/**
 * Strip everything that is not an ASCII letter or digit.
 */
export function sanitizeConfigName(configName: string): string {
    return configName.replace(/[^A-Za-z0-9]/g, "");
}

function pad(value: number, width = 2): string {
    return String(value).padStart(width, "0");
}

/**
 * Format a local time as YYYY_MM_DD_HH_MM_SS.
 */
export function formatFolderTimestamp(date: Date): string {
    return [
        pad(date.getFullYear(), 4),
        pad(date.getMonth() + 1),
        pad(date.getDate()),
        pad(date.getHours()),
        pad(date.getMinutes()),
        pad(date.getSeconds()),
    ].join("_");
}

/**
 * Compute the absolute folder a destination writes to.
 *
 * An explicit folder is used as given (relative ones against `cwd`). Otherwise the
 * folder is `<defaultRoot>/<sanitized config name>/<timestamp>`; runs of the same
 * config within one second get the same folder.
 */
export function resolveDestination(options: ResolveDestinationOptions): string {
    const { folderDir, configName, cwd } = options;

    if (folderDir !== undefined && folderDir !== "") {
        return path.resolve(cwd, folderDir);
    }

    // A name with no letters or digits leaves no segment: <defaultRoot>/<timestamp>
    const key = sanitizeConfigName(configName);
    const defaultRoot = path.resolve(cwd, options.defaultRoot ?? DEFAULT_ROOT_RELATIVE);
    const now = (options.clock ?? (() => new Date()))();
    const localFolder = path.join(defaultRoot, key, formatFolderTimestamp(now));

    options.console?.info(
        `Using folder '${localFolder}' in default root. Use --folder-dir to override.`,
    );
    return localFolder;
}
