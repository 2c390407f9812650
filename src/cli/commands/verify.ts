import { parseArgs } from "node:util";
import { formatBytes } from "../../utils/format";
import { COMMON_HELP, COMMON_OPTIONS, createService, reportFailure } from "../context";
import { color, formatSummary, ui } from "../ui";

export async function verifyCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      members: { type: "boolean", short: "m", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [name] = positionals;
  if (!name) {
    ui.error("Usage: confkeeper verify <backup-name>");
    return 1;
  }

  try {
    const service = await createService(values);
    if (!service) return 1;

    ui.intro("confkeeper verify");
    const inspection = await service.inspectBackup(name);

    ui.note(
      formatSummary([
        { label: "Archive", value: inspection.name },
        { label: "Path", value: inspection.path },
        { label: "Size", value: formatBytes(inspection.sizeBytes) },
        { label: "SHA-256", value: inspection.checksum },
        { label: "Members", value: inspection.members.length },
      ]),
      "Archive",
    );

    if (values.members) {
      for (const member of inspection.members) {
        ui.message(member);
      }
    }

    ui.outro("Archive is readable");
    return 0;
  } catch (error) {
    return reportFailure("Verify", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("confkeeper verify")} - Check that a backup opens and print its checksum

${color.dim("USAGE:")}
  confkeeper verify <backup-name> [OPTIONS]

${color.dim("OPTIONS:")}
  -m, --members           Print every member name
${COMMON_HELP}
`);
}
