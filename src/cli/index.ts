#!/usr/bin/env node
import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { writeCommand } from "./commands/write.js";
import { formatCommand } from "./commands/format.js";

const program = new Command();

program
    .name("folder-destination")
    .description("Write generated output trees into local folders")
    .version("0.1.0");

program
    .command("init")
    .description("Create a .folder-destination.yml configuration file in ~/.folder-destination")
    .option("--config <dir>", "Directory to write the config file to (defaults to ~/.folder-destination)")
    .option("--name <configName>", "Add a destination entry for this configuration")
    .action(initCommand);

program
    .command("write")
    .description("Replace the contents of a destination folder with an output tree")
    .argument("<outputTree>", "Directory holding the finished output")
    .requiredOption("--name <configName>", "Configuration name, used for the default folder and config lookup")
    .option("--folder-dir <dir>", "Local folder to write to (defaults to a new folder under the default root)")
    .option("--exclude <glob...>", "Destination paths to keep across the write")
    .option("--atomic", "Build the output in a staging folder and swap it in")
    .option("--config <dir>", "Directory containing the config file (defaults to ~/.folder-destination)")
    .action(writeCommand);

program
    .command("format")
    .description("Type-check and render a printf-style template")
    .argument("<template>", "Template, e.g. '%-10s %d'")
    .argument("[args...]", "Arguments, each read as a YAML value")
    .action(formatCommand);

program.parse();
