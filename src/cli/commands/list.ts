import { parseArgs } from "node:util";
import type { BackupListing } from "../../types";
import { formatBytes } from "../../utils/format";
import { COMMON_HELP, COMMON_OPTIONS, createService, reportFailure } from "../context";
import {
  color,
  formatTableRow,
  formatTableSeparator,
  formatTimestamp,
  TABLE_WIDTHS,
  ui,
} from "../ui";

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      format: { type: "string", default: "table" },
    },
    allowPositionals: false,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  try {
    const service = await createService(values);
    if (!service) return 1;

    const backups = await service.listBackups();

    // No intro for scripting formats
    if (values.format === "json") {
      console.log(JSON.stringify(backups, null, 2));
      return 0;
    }

    ui.intro("confkeeper list");

    if (backups.length === 0) {
      ui.info(`No backups found in ${service.backupDir}`);
      ui.outro("Done");
      return 0;
    }

    printTable(backups);

    const limit = service.maxBackups > 0 ? ` (keeping at most ${service.maxBackups})` : "";
    ui.outro(`${backups.length} backup(s) total${limit}`);
    return 0;
  } catch (error) {
    return reportFailure("List", error, values.verbose);
  }
}

function printTable(backups: BackupListing[]): void {
  const widths = [TABLE_WIDTHS.name, TABLE_WIDTHS.created, TABLE_WIDTHS.size, TABLE_WIDTHS.kind];
  const headers = ["Archive", "Modified", "Size", "Kind"];

  ui.step("Backups:");
  console.log(formatTableRow(headers, widths));
  console.log(formatTableSeparator(widths));

  for (const backup of backups) {
    console.log(
      formatTableRow(
        [
          backup.name,
          formatTimestamp(backup.modifiedAt),
          formatBytes(backup.sizeBytes),
          backup.managed ? "system" : color.cyan("upload"),
        ],
        widths,
      ),
    );
  }
}

function printHelp(): void {
  console.log(`
${color.bold("confkeeper list")} - List stored backups

${color.dim("USAGE:")}
  confkeeper list [OPTIONS]

${color.dim("OPTIONS:")}
      --format <fmt>      Output format: table (default) or json
${COMMON_HELP}
`);
}
