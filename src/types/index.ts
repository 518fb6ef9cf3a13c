export const UNKNOWN_TIMESTAMP = "unknown" as const;

/**
 * A decoded timestamp property. `"unknown"` means the property was present
 * but could not be converted, which is different from the field being absent.
 */
export type Timestamp = Date | typeof UNKNOWN_TIMESTAMP;

export interface EmailRecord {
  readonly from?: string;
  readonly to: readonly string[];
  readonly sentOn?: Timestamp;
  readonly cc?: string;
  readonly subject?: string;
  readonly body?: string;
}

export type TextField = "from" | "cc" | "subject" | "body";

export interface DecodedAttachment {
  content?: Buffer;
  filename?: string;
  mimeType?: string;
}

export type IssueScope = "container" | "entry" | "attachment";

export interface ExtractionIssue {
  scope: IssueScope;
  entryName: string;
  message: string;
}

export interface ProcessResult {
  record: EmailRecord;
  /** Filenames (not paths) written to the output directory, in discovery order. */
  attachments: string[];
  issues: ExtractionIssue[];
}

export type EmailFormat = "msg" | "eml";
