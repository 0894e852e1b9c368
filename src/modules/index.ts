import type { Console } from "../console/console.js";
import { format } from "../format/validator.js";
import { resolveDestination } from "../folder/resolver.js";
import { FolderDestination } from "../folder/writer.js";
import type { FolderWriter } from "../folder/writer.js";
import { ConfigError } from "../errors.js";

/**
 * Where a configuration writes its output. The evaluator's binding layer hands
 * these out; nothing here depends on how the evaluator represents values.
 */
export interface Destination {
    readonly localFolder: string;
    newWriter(): FolderWriter;
    getPreviousRef(labelName: string): string | null;
    getLabelNameWhenOrigin(): string;
}

/** `core.*` callables. */
export interface CoreModule {
    format(template: string, args: readonly unknown[]): string;
}

/** `folder.*` callables. */
export interface FolderModule {
    destination(configName?: string): Destination;
}

export interface FolderOptions {
    /** Value of --folder-dir, if given */
    folderDir?: string;
    cwd: string;
    /** Root for generated folders; relative paths resolve against `cwd` */
    defaultRoot?: string;
    /** Write through a staging folder swapped in with a rename */
    atomic?: boolean;
    clock?: () => Date;
    console?: Console;
}

export function createCoreModule(): CoreModule {
    return {
        format: (template, args) => format(template, args),
    };
}

/**
 * @param projectName Name of the configuration being evaluated; used when
 *   `destination()` is called without one
 */
export function createFolderModule(options: FolderOptions, projectName?: string): FolderModule {
    return {
        destination(configName = projectName): Destination {
            if (configName === undefined) {
                throw new ConfigError("folder.destination() needs a project name");
            }
            const localFolder = resolveDestination({
                folderDir: options.folderDir,
                configName,
                cwd: options.cwd,
                defaultRoot: options.defaultRoot,
                clock: options.clock,
                console: options.console,
            });
            return new FolderDestination(localFolder, { atomic: options.atomic });
        },
    };
}
