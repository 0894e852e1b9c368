import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import * as yaml from "yaml";
import { ConfigError } from "../errors.js";
import type { DestinationEntry, FolderDestinationConfig } from "./types.js";
import { CONFIG_DEFAULTS } from "./types.js";

/**
 * Returns the config home directory: ~/.folder-destination
 */
export function getConfigHome(): string {
    return path.join(os.homedir(), ".folder-destination");
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function validateDestination(entry: unknown, index: number): DestinationEntry {
    if (!isRecord(entry)) {
        throw new ConfigError(`destinations[${index}] must be an object`);
    }
    if (typeof entry.name !== "string" || entry.name.trim() === "") {
        throw new ConfigError(`destinations[${index}].name must be a non-empty string`);
    }

    const destination: DestinationEntry = { name: entry.name.trim(), exclude: [] };

    if (entry.folderDir !== undefined && entry.folderDir !== null) {
        if (typeof entry.folderDir !== "string" || entry.folderDir.trim() === "") {
            throw new ConfigError(`destinations[${index}].folderDir must be a non-empty string`);
        }
        destination.folderDir = entry.folderDir;
    }

    if (entry.exclude !== undefined && entry.exclude !== null) {
        if (!Array.isArray(entry.exclude)) {
            throw new ConfigError(`destinations[${index}].exclude must be an array`);
        }
        for (const pattern of entry.exclude) {
            if (typeof pattern !== "string" || pattern.trim() === "") {
                throw new ConfigError(`destinations[${index}].exclude entries must be non-empty strings`);
            }
            destination.exclude.push(pattern);
        }
    }

    return destination;
}

/**
 * Validate a loaded configuration object. Throws ConfigError on invalid config.
 */
export function validateConfig(config: unknown): FolderDestinationConfig {
    // An empty file parses to null; every key is optional
    const raw = config === null || config === undefined ? {} : config;
    if (!isRecord(raw)) {
        throw new ConfigError("Configuration must be a YAML object");
    }

    let defaultRoot: string = CONFIG_DEFAULTS.defaultRoot;
    if (raw.defaultRoot !== undefined && raw.defaultRoot !== null) {
        if (typeof raw.defaultRoot !== "string" || raw.defaultRoot.trim() === "") {
            throw new ConfigError("defaultRoot must be a non-empty string");
        }
        defaultRoot = raw.defaultRoot;
    }

    let atomicWrites: boolean = CONFIG_DEFAULTS.atomicWrites;
    if (raw.atomicWrites !== undefined && raw.atomicWrites !== null) {
        if (typeof raw.atomicWrites !== "boolean") {
            throw new ConfigError("atomicWrites must be true or false");
        }
        atomicWrites = raw.atomicWrites;
    }

    const maxLogSizeMB = raw.maxLogSizeMB ?? CONFIG_DEFAULTS.maxLogSizeMB;
    if (typeof maxLogSizeMB !== "number" || maxLogSizeMB <= 0) {
        throw new ConfigError("maxLogSizeMB must be a positive number");
    }
    const maxLogFiles = raw.maxLogFiles ?? CONFIG_DEFAULTS.maxLogFiles;
    if (typeof maxLogFiles !== "number" || maxLogFiles <= 0 || !Number.isInteger(maxLogFiles)) {
        throw new ConfigError("maxLogFiles must be a positive integer");
    }

    const rawDestinations = raw.destinations ?? [];
    if (!Array.isArray(rawDestinations)) {
        throw new ConfigError("destinations must be an array");
    }
    const destinations = rawDestinations.map((entry: unknown, index: number) => validateDestination(entry, index));

    const names = new Set<string>();
    for (const destination of destinations) {
        if (names.has(destination.name)) {
            throw new ConfigError(`Duplicate destination name: ${destination.name}`);
        }
        names.add(destination.name);
    }

    const result: FolderDestinationConfig = { defaultRoot, atomicWrites, maxLogSizeMB, maxLogFiles, destinations };
    if (raw.logDir !== undefined && raw.logDir !== null) {
        if (typeof raw.logDir !== "string" || raw.logDir.trim() === "") {
            throw new ConfigError("logDir must be a non-empty string");
        }
        result.logDir = raw.logDir;
    }
    return result;
}

/**
 * Load and validate the config from a YAML file.
 * @param configDir Directory containing the config file (defaults to ~/.folder-destination)
 */
export function loadConfig(configDir?: string): FolderDestinationConfig {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (!fs.existsSync(configPath)) {
        throw new ConfigError(`Config file not found: ${configPath}`);
    }

    const raw = fs.readFileSync(configPath, "utf-8");
    let parsed: unknown;
    try {
        parsed = yaml.parse(raw);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Cannot parse ${configPath}: ${message}`);
    }
    return validateConfig(parsed);
}

/**
 * Like loadConfig, but a missing file yields the defaults.
 */
export function loadConfigOrDefaults(configDir?: string): FolderDestinationConfig {
    const dir = configDir ?? getConfigHome();
    if (!fs.existsSync(path.join(dir, CONFIG_DEFAULTS.configFileName))) {
        return validateConfig(null);
    }
    return loadConfig(dir);
}

/**
 * Find the settings for a configuration name, if the config file has any.
 */
export function findDestination(config: FolderDestinationConfig, name: string): DestinationEntry | undefined {
    return config.destinations.find((destination) => destination.name === name);
}

/**
 * Write a default .folder-destination.yml configuration file.
 * @param configDir Directory to write the config file to (defaults to ~/.folder-destination)
 * @param destinationName Seed the destinations list with an entry of this name
 * @returns The path of the created file
 */
export function writeDefaultConfig(configDir?: string, destinationName?: string): string {
    const dir = configDir ?? getConfigHome();
    const configPath = path.join(dir, CONFIG_DEFAULTS.configFileName);

    if (fs.existsSync(configPath)) {
        throw new ConfigError(`Config file already exists: ${configPath}`);
    }

    fs.mkdirSync(dir, { recursive: true });

    const template = [
        "# folder-destination configuration",
        "",
        "# Root for generated output folders, relative to the working directory.",
        "# Folders are created as <defaultRoot>/<config name>/<YYYY_MM_DD_HH_MM_SS>.",
        "defaultRoot: copybara/out",
        "",
        "# Build each write in a staging folder and swap it in with a rename",
        "atomicWrites: false",
        "",
        "# Log rotation settings (optional)",
        "# maxLogSizeMB: 10    # Max log file size in MB before rotation (default: 10)",
        "# maxLogFiles: 5      # Max number of rotated log files to keep (default: 5)",
        "# logDir: /var/log/folder-destination",
        "",
        "# Per-configuration settings, matched by name (write --name <name>)",
        "destinations:",
        ...(destinationName === undefined ? [] : [`  - name: ${yaml.stringify(destinationName).trim()}`, "    exclude: []"]),
        "# - name: my-project",
        "#   folderDir: /tmp/my-project-out   # omit to generate one under defaultRoot",
        "#   exclude:                         # paths kept across writes",
        "#     - \"README.local.md\"",
        "#     - \"notes/**\"",
    ].join("\n") + "\n";

    fs.writeFileSync(configPath, template, "utf-8");
    return configPath;
}
