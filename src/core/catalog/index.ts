export { inspectBackup, listBackups } from "./list";
