#!/usr/bin/env node
import { Command } from "commander";
import { CONFIG_DEFAULTS } from "../config/types.js";
import { readBuildInfo } from "../version/version.js";
import { initCommand } from "./commands/init.js";
import { schemaCommand } from "./commands/schema.js";
import { syncCommand, type SyncOptions } from "./commands/sync.js";
import { versionCommand } from "./commands/version.js";

const buildInfo = readBuildInfo();
const program = new Command();

program
    .name("rulerelay")
    .description("Synchronise AI coding tool rule files across directories")
    .version(buildInfo.version)
    .option("-c, --config <path>", "Path to config file", CONFIG_DEFAULTS.configFileName)
    .option("-v, --verbose", "Enable verbose output")
    .option("--log-file <path>", "Also write log lines to this file");

program
    .command("sync")
    .description("Synchronize rule files according to configuration")
    .option("-d, --dry-run", "Simulate execution without applying changes")
    .action((_options: unknown, command: Command) => {
        const opts = command.optsWithGlobals();
        const options: SyncOptions = {
            config: opts.config,
            verbose: opts.verbose,
            logFile: opts.logFile,
            dryRun: opts.dryRun,
        };
        process.exitCode = syncCommand(options);
    });

program
    .command("init")
    .description("Create a .rulerelay.yaml configuration file")
    .argument("[dir]", "Directory to write the config file to (defaults to the current directory)")
    .action((dir: string | undefined) => {
        process.exitCode = initCommand(dir);
    });

program
    .command("version")
    .description("Display version information")
    .action(() => {
        process.exitCode = versionCommand(buildInfo);
    });

program
    .command("schema")
    .description("Print the JSON Schema for the configuration file")
    .action(() => {
        process.exitCode = schemaCommand();
    });

program.parse();
