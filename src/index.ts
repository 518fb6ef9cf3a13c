export { processEmailFile, detectFormat } from "./processor/index.js";
export type { ProcessOptions } from "./processor/index.js";
export { parseEml } from "./parser/index.js";
export { RecordBuilder, emptyRecord } from "./record/index.js";
export {
  attachmentFilename,
  createAttachmentSink,
  sanitizeFilename,
  storeAttachment,
} from "./storage/index.js";
export * from "./msg/index.js";
export * from "./types/index.js";
