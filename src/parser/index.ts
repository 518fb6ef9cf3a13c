import { simpleParser, type AddressObject, type ParsedMail } from "mailparser";
import { RecordBuilder } from "../record/index.js";
import { UNKNOWN_TIMESTAMP, type EmailRecord } from "../types/index.js";

export interface ParsedEmlAttachment {
  filename?: string;
  contentType: string;
  content: Buffer;
}

export interface ParsedEml {
  record: EmailRecord;
  attachments: ParsedEmlAttachment[];
}

function addresses(addr: ParsedMail["to"]): string[] {
  if (!addr) return [];
  const objects: AddressObject[] = Array.isArray(addr) ? addr : [addr];
  return objects.flatMap((a) =>
    a.value.map((v) => (v.name ? `${v.name} <${v.address ?? ""}>` : v.address ?? ""))
  );
}

function addressListToString(addr: ParsedMail["to"]): string | undefined {
  const list = addresses(addr);
  return list.length > 0 ? list.join(", ") : undefined;
}

/**
 * Parse a MIME message into the same record shape as the `.msg` path.
 */
export async function parseEml(rawMessage: Buffer | string): Promise<ParsedEml> {
  const parsed = await simpleParser(rawMessage);
  const builder = new RecordBuilder();

  const from = addressListToString(parsed.from);
  if (from !== undefined) builder.setText("from", from);
  const cc = addressListToString(parsed.cc);
  if (cc !== undefined) builder.setText("cc", cc);
  if (parsed.subject !== undefined) builder.setText("subject", parsed.subject);

  const body = parsed.text?.trim();
  if (body) builder.setText("body", body);

  for (const recipient of addresses(parsed.to)) {
    builder.addRecipient(recipient);
  }

  // Parse the raw header so an unparseable Date stays distinct from a
  // missing one.
  const dateLine = parsed.headerLines.find((h) => h.key === "date");
  if (dateLine) {
    const date = new Date(dateLine.line.slice(dateLine.line.indexOf(":") + 1).trim());
    builder.setSentOn(Number.isNaN(date.getTime()) ? UNKNOWN_TIMESTAMP : date);
  }

  const attachments: ParsedEmlAttachment[] = parsed.attachments.map((att) => ({
    filename: att.filename,
    contentType: att.contentType,
    content: att.content,
  }));

  return { record: builder.build(), attachments };
}
