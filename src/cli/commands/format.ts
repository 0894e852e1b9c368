import * as yaml from "yaml";
import { createCoreModule } from "../../modules/index.js";

/**
 * Read each command-line argument as a YAML value, so `1234` is an int,
 * `1.5` a float, `'1234'` a string and `[a, b]` a list.
 */
export function parseFormatArgs(args: readonly string[]): unknown[] {
    return args.map((arg) => {
        const value: unknown = yaml.parse(arg);
        return value ?? null;
    });
}

export function formatCommand(template: string, args: string[]): void {
    try {
        const core = createCoreModule();
        console.log(core.format(template, parseFormatArgs(args)));
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(1);
    }
}
