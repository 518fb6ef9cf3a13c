import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { logger } from "../config/logger.js";
import type { AttachmentSink } from "../msg/extractor.js";
import type { DecodedAttachment } from "../types/index.js";

const MIME_EXTENSIONS: ReadonlyMap<string, string> = new Map([
  ["application/pdf", ".pdf"],
  ["text/plain", ".txt"],
  ["image/jpeg", ".jpg"],
  ["image/png", ".png"],
  ["application/msword", ".doc"],
]);

const DEFAULT_EXTENSION = ".bin";

export function sanitizeFilename(name: string): string {
  return name.replace(/[<>:"/\\|?*]/g, ".");
}

export function extensionFor(mimeType: string | undefined): string {
  if (mimeType === undefined) return DEFAULT_EXTENSION;
  return MIME_EXTENSIONS.get(mimeType) ?? DEFAULT_EXTENSION;
}

/**
 * Name an attachment from its declared filename, or from the last 8
 * characters of its group entry when it has none. An extension is added
 * only when the name has no period in it.
 */
export function attachmentFilename(
  attachment: DecodedAttachment,
  groupName: string
): string {
  const base = sanitizeFilename(
    attachment.filename || `attachment_${groupName.slice(-8)}`
  );
  return base.includes(".") ? base : base + extensionFor(attachment.mimeType);
}

export async function ensureOutputDir(outputDir: string): Promise<void> {
  await mkdir(outputDir, { recursive: true });
}

/**
 * Write attachment bytes to `outputDir/filename`, replacing any existing
 * file, and return the filename.
 */
export async function storeAttachment(
  outputDir: string,
  filename: string,
  content: Buffer
): Promise<string> {
  const filePath = join(outputDir, filename);
  await writeFile(filePath, content);

  logger.debug(
    { filename, size: content.length, path: filePath },
    "Attachment stored to disk"
  );

  return filename;
}

export function createAttachmentSink(outputDir: string): AttachmentSink {
  return async (attachment, groupName) => {
    if (!attachment.content) {
      throw new Error(`Attachment ${groupName} has no content`);
    }
    return storeAttachment(
      outputDir,
      attachmentFilename(attachment, groupName),
      attachment.content
    );
  };
}
