import { logger } from "../config/logger.js";
import type { RecordBuilder } from "../record/index.js";
import type {
  DecodedAttachment,
  ExtractionIssue,
  IssueScope,
} from "../types/index.js";
import { readEntry, type ContainerEntry } from "./container.js";
import { decodeProperty } from "./decoder.js";
import {
  ATTACHMENT_PROPERTIES,
  RECIPIENT_ADDRESS,
  SCALAR_PROPERTIES,
  isAttachmentGroup,
  isRecipientGroup,
} from "./properties.js";

/**
 * Receives each attachment that has payload bytes and returns the filename
 * it was stored under.
 */
export type AttachmentSink = (
  attachment: DecodedAttachment,
  groupName: string
) => Promise<string>;

export interface ExtractionContext {
  builder: RecordBuilder;
  sink: AttachmentSink;
  issues: ExtractionIssue[];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function report(
  ctx: ExtractionContext,
  scope: IssueScope,
  entryName: string,
  error: unknown
): void {
  const message = errorMessage(error);
  logger.warn({ entryName, scope, error: message }, "Failed to extract entry");
  ctx.issues.push({ scope, entryName, message });
}

function extractScalar(entry: ContainerEntry, ctx: ExtractionContext): void {
  const field = SCALAR_PROPERTIES.get(entry.name);
  if (field === undefined) return;
  // The first sent timestamp wins; later ones are not even decoded.
  if (field === "sentOn" && ctx.builder.hasSentOn()) return;

  const decoded = decodeProperty(entry.name, readEntry(entry), (error) =>
    report(ctx, "entry", entry.name, error)
  );

  if (field === "sentOn") {
    if (decoded?.type === "time") ctx.builder.setSentOn(decoded.value);
  } else if (decoded?.type === "text") {
    ctx.builder.setText(field, decoded.value);
  }
}

function extractRecipients(group: ContainerEntry, ctx: ExtractionContext): void {
  for (const child of group.children()) {
    if (child.isDirectory || child.name !== RECIPIENT_ADDRESS) continue;
    try {
      const decoded = decodeProperty(child.name, readEntry(child));
      if (decoded?.type === "text") ctx.builder.addRecipient(decoded.value);
    } catch (error) {
      report(ctx, "entry", `${group.name}/${child.name}`, error);
    }
  }
}

function decodeAttachment(
  group: ContainerEntry,
  ctx: ExtractionContext
): DecodedAttachment {
  const attachment: DecodedAttachment = {};

  for (const child of group.children()) {
    if (child.isDirectory) continue;
    const property = ATTACHMENT_PROPERTIES.get(child.name);
    if (property === undefined) continue;
    if (property === "filename" && attachment.filename !== undefined) continue;

    try {
      const decoded = decodeProperty(child.name, readEntry(child));
      if (decoded?.type === "binary" && property === "content") {
        attachment.content = decoded.value;
      } else if (decoded?.type === "text" && property !== "content") {
        attachment[property] = decoded.value;
      }
    } catch (error) {
      report(ctx, "entry", `${group.name}/${child.name}`, error);
    }
  }

  return attachment;
}

async function extractAttachment(
  group: ContainerEntry,
  ctx: ExtractionContext,
  attachments: string[]
): Promise<void> {
  const attachment = decodeAttachment(group, ctx);
  if (!attachment.content || attachment.content.length === 0) {
    logger.debug({ entryName: group.name }, "Attachment has no payload, skipping");
    return;
  }

  try {
    attachments.push(await ctx.sink(attachment, group.name));
  } catch (error) {
    report(ctx, "attachment", group.name, error);
  }
}

/**
 * Walk the root-level entries of a `.msg` container, filling the builder and
 * storing attachments through the sink. A failure on one entry is recorded
 * in `ctx.issues` and the walk carries on.
 *
 * @returns the stored attachment filenames, in traversal order
 */
export async function extractMsgRecord(
  root: ContainerEntry,
  ctx: ExtractionContext
): Promise<string[]> {
  const attachments: string[] = [];

  for (const entry of root.children()) {
    try {
      if (!entry.isDirectory) {
        extractScalar(entry, ctx);
      } else if (isRecipientGroup(entry.name)) {
        extractRecipients(entry, ctx);
      } else if (isAttachmentGroup(entry.name)) {
        await extractAttachment(entry, ctx, attachments);
      }
    } catch (error) {
      report(ctx, "entry", entry.name, error);
    }
  }

  return attachments;
}
