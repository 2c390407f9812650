import { parseArgs } from "node:util";
import { COMMON_HELP, COMMON_OPTIONS, createService, reportFailure } from "../context";
import { color, ui } from "../ui";

export async function downloadCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      overwrite: { type: "boolean", short: "f", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [name, destination] = positionals;
  if (!name || !destination) {
    ui.error("Usage: confkeeper download <backup-name> <destination>");
    return 1;
  }

  try {
    const service = await createService(values);
    if (!service) return 1;

    ui.banner("download");
    const target = await service.downloadBackup(name, destination, values.overwrite);
    ui.success(`Copied to ${target}`);
    return 0;
  } catch (error) {
    return reportFailure("Download", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("confkeeper download")} - Copy a backup out of the backup directory

${color.dim("USAGE:")}
  confkeeper download <backup-name> <destination> [OPTIONS]

  The ".zip" suffix of the backup name may be omitted. A destination that is
  an existing directory, or ends with "/", receives the file under its own name.

${color.dim("OPTIONS:")}
  -f, --overwrite         Replace an existing destination file
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  confkeeper download ha_backup_20240101_120000 /mnt/usb/
  confkeeper download ha_backup_20240101_120000.zip ./latest.zip --overwrite
`);
}
