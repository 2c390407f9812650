import { parseArgs } from "node:util";
import { formatBytes, formatDuration } from "../../utils/format";
import { COMMON_HELP, COMMON_OPTIONS, createService, reportFailure } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function backupCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      path: { type: "string", short: "p", multiple: true },
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

    ui.intro("confkeeper backup");

    const s = ui.spinner();
    s.start("Creating archive...");
    const startedAt = Date.now();
    const result = await service.backupNow(values.path);
    const durationMs = Date.now() - startedAt;

    if (!result) {
      s.stop("Nothing to back up");
      ui.warn("None of the configured sources exist; no archive was written.");
      ui.outro("Done");
      return 0;
    }

    s.stop("Archive created");

    ui.note(
      formatSummary([
        { label: "Archive", value: result.archiveName },
        { label: "Path", value: result.archivePath },
        { label: "Size", value: formatBytes(result.sizeBytes) },
        { label: "Files", value: result.filesCount },
        { label: "Sources", value: result.sourcePaths.length },
        { label: "Duration", value: formatDuration(durationMs) },
        {
          label: "Pruned",
          value: result.retention?.deleted.length ? result.retention.deleted.join(", ") : null,
        },
        {
          label: "Prune failures",
          value: result.retention?.failed.length ? result.retention.failed.join(", ") : null,
        },
      ]),
      "Backup Summary",
    );

    ui.outro("Backup complete!");
    return 0;
  } catch (error) {
    return reportFailure("Backup", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("confkeeper backup")} - Create a backup of the configuration tree

${color.dim("USAGE:")}
  confkeeper backup [OPTIONS]

${color.dim("OPTIONS:")}
  -p, --path <path>       Back up this path instead of the configured sources
                          (relative to the root, can be repeated)
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  confkeeper backup                              # Back up the configured sources
  confkeeper backup -p configuration.yaml        # Back up a single file
  confkeeper backup --root /config --max-backups 5
`);
}
