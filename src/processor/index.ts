import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { config } from "../config/index.js";
import { logger } from "../config/logger.js";
import { openContainer, type ContainerEntry } from "../msg/container.js";
import { extractMsgRecord } from "../msg/extractor.js";
import { parseEml, type ParsedEml } from "../parser/index.js";
import { RecordBuilder, emptyRecord } from "../record/index.js";
import {
  createAttachmentSink,
  ensureOutputDir,
  sanitizeFilename,
  storeAttachment,
} from "../storage/index.js";
import type {
  EmailFormat,
  ExtractionIssue,
  ProcessResult,
} from "../types/index.js";

export interface ProcessOptions {
  /** Directory attachments are written to. Defaults to OUTPUT_DIR. */
  outputDir?: string;
}

export function detectFormat(filePath: string): EmailFormat | undefined {
  switch (extname(filePath).toLowerCase()) {
    case ".msg":
      return "msg";
    case ".eml":
      return "eml";
    default:
      return undefined;
  }
}

function failed(filePath: string, error: unknown): ProcessResult {
  const message = error instanceof Error ? error.message : String(error);
  logger.error({ filePath, error: message }, "Failed to process email file");
  return {
    record: emptyRecord(),
    attachments: [],
    issues: [{ scope: "container", entryName: filePath, message }],
  };
}

async function processMsg(filePath: string, outputDir: string): Promise<ProcessResult> {
  let root: ContainerEntry;
  try {
    root = (await openContainer(filePath)).root;
  } catch (error) {
    return failed(filePath, error);
  }

  const builder = new RecordBuilder();
  const issues: ExtractionIssue[] = [];
  const attachments = await extractMsgRecord(root, {
    builder,
    sink: createAttachmentSink(outputDir),
    issues,
  });

  return { record: builder.build(), attachments, issues };
}

async function processEml(filePath: string, outputDir: string): Promise<ProcessResult> {
  let parsed: ParsedEml;
  try {
    parsed = await parseEml(await readFile(filePath));
  } catch (error) {
    return failed(filePath, error);
  }

  const attachments: string[] = [];
  const issues: ExtractionIssue[] = [];

  for (const [index, att] of parsed.attachments.entries()) {
    const filename = att.filename
      ? sanitizeFilename(att.filename)
      : `attachment_${index}.bin`;
    try {
      attachments.push(await storeAttachment(outputDir, filename, att.content));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn({ filename, error: message }, "Failed to store attachment");
      issues.push({ scope: "attachment", entryName: filename, message });
    }
  }

  return { record: parsed.record, attachments, issues };
}

/**
 * Extract the record and attachments from one `.msg` or `.eml` file.
 * Never rejects on bad input: failures come back as issues alongside a
 * (possibly empty) record.
 */
export async function processEmailFile(
  filePath: string,
  options: ProcessOptions = {}
): Promise<ProcessResult> {
  const outputDir = options.outputDir ?? config.output.dir;
  const format = detectFormat(filePath);

  if (!format) {
    return failed(filePath, new Error(`Unsupported file type: ${extname(filePath) || "(none)"}`));
  }

  try {
    await ensureOutputDir(outputDir);
  } catch (error) {
    return failed(filePath, error);
  }

  const result =
    format === "msg"
      ? await processMsg(filePath, outputDir)
      : await processEml(filePath, outputDir);

  logger.info(
    {
      filePath,
      format,
      subject: result.record.subject,
      attachments: result.attachments.length,
      issues: result.issues.length,
    },
    "Email file processed"
  );

  return result;
}
