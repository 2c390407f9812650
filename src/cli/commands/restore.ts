import { parseArgs } from "node:util";
import { COMMON_HELP, COMMON_OPTIONS, createService, reportFailure } from "../context";
import { color, ui } from "../ui";

export async function restoreCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      ...COMMON_OPTIONS,
      target: { type: "string", short: "t", multiple: true },
      overwrite: { type: "boolean", short: "f", default: false },
      yes: { type: "boolean", short: "y", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    printHelp();
    return 0;
  }

  const [name] = positionals;
  if (!name) {
    ui.error("Usage: confkeeper restore <backup-name> [--target <path>...]");
    return 1;
  }

  try {
    const service = await createService(values);
    if (!service) return 1;

    ui.intro("confkeeper restore");

    const scope = values.target?.length ? values.target.join(", ") : "everything";
    if (!values.yes) {
      const confirmed = await ui.confirm({
        message: `Restore ${scope} from ${name} into ${service.root}${
          values.overwrite ? ", replacing existing files" : ""
        }?`,
      });
      if (ui.isCancel(confirmed) || !confirmed) {
        ui.cancel("Restore cancelled");
        return 1;
      }
    }

    const restored = await service.restoreBackup(name, values.target, values.overwrite);

    if (restored.length === 0) {
      ui.warn("No archive members matched");
    } else {
      ui.step("Restored files:");
      for (const filePath of restored) {
        ui.message(filePath);
      }
    }

    ui.outro(`${restored.length} file(s) restored`);
    return 0;
  } catch (error) {
    return reportFailure("Restore", error, values.verbose);
  }
}

function printHelp(): void {
  console.log(`
${color.bold("confkeeper restore")} - Extract a backup into the configuration root

${color.dim("USAGE:")}
  confkeeper restore <backup-name> [OPTIONS]

  Restoring stops at the first member that already exists (unless --overwrite)
  or that would land outside the root. Files written before that point stay.

${color.dim("OPTIONS:")}
  -t, --target <path>     Only restore this file or directory, relative to the
                          root (can be repeated)
  -f, --overwrite         Replace existing files
  -y, --yes               Do not ask for confirmation
${COMMON_HELP}

${color.dim("EXAMPLES:")}
  confkeeper restore ha_backup_20240101_120000 --yes
  confkeeper restore ha_backup_20240101_120000 -t automations.yaml -t blueprints -f
`);
}
