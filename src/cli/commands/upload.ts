import { parseArgs } from "node:util";
import { COMMON_HELP, COMMON_OPTIONS, createService, reportFailure } from "../context";
import { color, ui } from "../ui";

export async function uploadCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      name: { type: "string", short: "n" },
      overwrite: { type: "boolean", short: "f", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [source] = positionals;
  if (!source) {
    ui.error("Usage: confkeeper upload <source> [--name <backup-name>]");
    return 1;
  }

  try {
    const service = await createService(values);
    if (!service) return 1;

    ui.banner("upload");
    const stored = await service.uploadBackup(source, values.name, values.overwrite);
    ui.success(`Stored as ${stored}`);
    return 0;
  } catch (error) {
    return reportFailure("Upload", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("confkeeper upload")} - Copy an archive into the backup directory

${color.dim("USAGE:")}
  confkeeper upload <source> [OPTIONS]

  Only the file name part of --name is used; names that are absolute or
  contain ".." are rejected. Uploaded archives that do not follow the
  ha_backup_<timestamp>.zip pattern are never pruned.

${color.dim("OPTIONS:")}
  -n, --name <name>       Store under this name (default: the source's file name)
  -f, --overwrite         Replace an existing backup with the same name
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  confkeeper upload /mnt/usb/ha_backup_20240101_120000.zip
  confkeeper upload ./old.zip --name before-upgrade.zip
`);
}
