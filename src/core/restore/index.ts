export { resolveBackupFile } from "./resolve-backup";
export {
  matchesTargets,
  normalizeTargets,
  type RestoreOptions,
  restoreBackup,
} from "./restorer";
