export { copyWithMetadata } from "./copy";
export { type DownloadOptions, downloadBackup, resolveDownloadTarget } from "./download";
export { resolveUploadName, type UploadOptions, uploadBackup } from "./upload";
