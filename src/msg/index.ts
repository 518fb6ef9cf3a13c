export { openContainer, readContainer, readEntry } from "./container.js";
export type { Container, ContainerEntry, EntryStream } from "./container.js";
export { decodeUtf16Text, decodeFiletime, decodeProperty } from "./decoder.js";
export type { PropertyValue } from "./decoder.js";
export { extractMsgRecord } from "./extractor.js";
export type { AttachmentSink, ExtractionContext } from "./extractor.js";
