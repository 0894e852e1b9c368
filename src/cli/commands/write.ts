import * as fs from "node:fs";
import * as path from "node:path";
import { findDestination, loadConfigOrDefaults } from "../../config/loader.js";
import type { FolderDestinationConfig } from "../../config/types.js";
import type { Console } from "../../console/console.js";
import { Logger } from "../../console/logger.js";
import { ConfigError } from "../../errors.js";
import { createFolderModule } from "../../modules/index.js";

export interface WriteOptions {
    name: string;
    folderDir?: string;
    exclude?: string[];
    atomic?: boolean;
    config?: string;
}

/**
 * Resolve the destination for `options.name` and write `outputTree` into it.
 * Exclusions from the config file come first, then those given with --exclude.
 * @returns The folder written to
 */
export function runWrite(
    outputTree: string,
    options: WriteOptions,
    cwd: string,
    console: Console,
    config: FolderDestinationConfig = loadConfigOrDefaults(options.config),
): string {
    const entry = findDestination(config, options.name);

    const source = path.resolve(cwd, outputTree);
    if (!fs.statSync(source, { throwIfNoEntry: false })?.isDirectory()) {
        throw new ConfigError(`Output tree is not a directory: ${source}`);
    }

    const folder = createFolderModule(
        {
            folderDir: options.folderDir ?? entry?.folderDir,
            cwd,
            defaultRoot: config.defaultRoot,
            atomic: options.atomic ?? config.atomicWrites,
            console,
        },
        options.name,
    );
    const destination = folder.destination();
    destination.newWriter().write(
        {
            outputTree: source,
            excludedPaths: [...(entry?.exclude ?? []), ...(options.exclude ?? [])],
        },
        console,
    );
    return destination.localFolder;
}

export function writeCommand(outputTree: string, options: WriteOptions): void {
    try {
        const config = loadConfigOrDefaults(options.config);
        const logger = new Logger({
            logDir: config.logDir,
            maxLogSizeMB: config.maxLogSizeMB,
            maxLogFiles: config.maxLogFiles,
            echo: true,
        });

        const localFolder = runWrite(outputTree, options, process.cwd(), logger, config);
        logger.info(`Wrote ${outputTree} to ${localFolder}`);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }
}
