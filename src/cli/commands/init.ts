import { writeDefaultConfig } from "../../config/loader.js";

interface InitOptions {
    config?: string;
    name?: string;
}

export function initCommand(options: InitOptions): void {
    try {
        const configPath = writeDefaultConfig(options.config, options.name);
        console.log(`Created configuration file: ${configPath}`);
        if (options.name === undefined) {
            console.log("Add a destination entry per configuration, then run 'folder-destination write'.");
        } else {
            console.log(`Next: folder-destination write <outputTree> --name ${options.name}`);
        }
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }
}
