#!/usr/bin/env node
import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { syncCommand, forceUploadCommand, forceDownloadCommand } from "./commands/sync.js";
import { statusCommand } from "./commands/status.js";
import { listBackupsCommand, restoreCommand } from "./commands/backups.js";
import { watchCommand } from "./commands/watch.js";

const CONFIG_HELP = "Directory containing the config file (defaults to ~/.termsync)";

const program = new Command();

program
    .name("termsync")
    .description("Keep a terminal application's configuration in sync across machines")
    .version("0.1.0");

program
    .command("init")
    .description("Create a .termsync.yml configuration file in ~/.termsync")
    .option("--config <dir>", "Directory to write the config file to (defaults to ~/.termsync)")
    .action(initCommand);

program
    .command("sync")
    .description("Reconcile local configuration with the hosted copy")
    .option("--force-upload", "Replace the hosted copy with the local configuration")
    .option("--force-download", "Replace the local configuration with the hosted copy")
    .option("--verbose", "Write debug details to the log")
    .option("--config <dir>", CONFIG_HELP)
    .action(syncCommand);

program
    .command("force-upload")
    .description("Replace the hosted copy with the local configuration")
    .option("--verbose", "Write debug details to the log")
    .option("--config <dir>", CONFIG_HELP)
    .action(forceUploadCommand);

program
    .command("force-download")
    .description("Replace the local configuration with the hosted copy (a backup is taken first)")
    .option("--verbose", "Write debug details to the log")
    .option("--config <dir>", CONFIG_HELP)
    .action(forceDownloadCommand);

program
    .command("status")
    .description("Show sync state, items and recent history")
    .option("--no-remote", "Do not contact the store")
    .option("--config <dir>", CONFIG_HELP)
    .action(statusCommand);

program
    .command("list-backups")
    .description("List backups, newest first")
    .option("--config <dir>", CONFIG_HELP)
    .action(listBackupsCommand);

program
    .command("restore <id>")
    .description("Restore a backup (the current state is backed up first)")
    .option("--rollback", "Apply the backup without validating the result")
    .option("--config <dir>", CONFIG_HELP)
    .action(restoreCommand);

program
    .command("watch")
    .description("Sync when the terminal application starts and stops")
    .option("--config <dir>", CONFIG_HELP)
    .action(watchCommand);

await program.parseAsync();
