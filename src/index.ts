#!/usr/bin/env node

import * as p from "@clack/prompts";
import color from "picocolors";
import { backupCommand } from "./cli/commands/backup";
import { downloadCommand } from "./cli/commands/download";
import { listCommand } from "./cli/commands/list";
import { restoreCommand } from "./cli/commands/restore";
import { uploadCommand } from "./cli/commands/upload";
import { verifyCommand } from "./cli/commands/verify";
import { LOGO, VERSION } from "./cli/ui";

function printHelp(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.intro(`${color.cyan("confkeeper")} ${color.dim(`v${VERSION}`)} - Configuration backups`);

  p.note(
    `${color.cyan("backup")}      Create a backup now
${color.cyan("list")}        List stored backups
${color.cyan("restore")}     Extract a backup into the configuration root
${color.cyan("download")}    Copy a backup out of the backup directory
${color.cyan("upload")}      Copy an archive into the backup directory
${color.cyan("verify")}      Check that a backup opens and print its checksum`,
    "Commands",
  );

  p.note(
    `-h, --help      Show this help message
-v, --version   Show version`,
    "Options",
  );

  p.note(
    `confkeeper backup                               ${color.dim("# Back up configured sources")}
confkeeper list                                 ${color.dim("# List all backups")}
confkeeper restore ha_backup_20240101_120000    ${color.dim("# Restore everything")}
confkeeper download ha_backup_20240101_120000 ~/  ${color.dim("# Copy a backup out")}`,
    "Examples",
  );

  p.outro(`Run ${color.cyan("confkeeper <command> --help")} for command details`);
}

function printVersion(): void {
  console.log(color.bold(color.cyan(LOGO)));
  p.outro(`${color.cyan("confkeeper")} ${color.dim(`v${VERSION}`)}`);
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    printHelp();
    return 0;
  }

  const command = args[0];
  const commandArgs = args.slice(1);

  switch (command) {
    case "backup":
      return backupCommand(commandArgs);

    case "list":
      return listCommand(commandArgs);

    case "restore":
      return restoreCommand(commandArgs);

    case "download":
      return downloadCommand(commandArgs);

    case "upload":
      return uploadCommand(commandArgs);

    case "verify":
      return verifyCommand(commandArgs);

    case "-h":
    case "--help":
    case "help":
      printHelp();
      return 0;

    case "-v":
    case "--version":
    case "version":
      printVersion();
      return 0;

    default:
      console.error(`${color.red("Error:")} Unknown command: ${command}`);
      console.error(`Run ${color.cyan("confkeeper --help")} for usage information.`);
      return 1;
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error(`${color.red("Fatal error:")}`, error);
    process.exit(1);
  });
