import type { TextField } from "../types/index.js";

export const PROPERTY_STREAM_PREFIX = "__substg1.0_";
export const RECIPIENT_GROUP_PREFIX = "__recip_version1.0_";
export const ATTACHMENT_GROUP_PREFIX = "__attach_version1.0_";

/** MAPI property types carried in the last four hex digits of a stream name. */
export type PropertyType = "text" | "time" | "binary";

const PROPERTY_TYPES: Record<string, PropertyType> = {
  "001F": "text",
  "0040": "time",
  "0102": "binary",
};

function stream(tag: string): string {
  return `${PROPERTY_STREAM_PREFIX}${tag}`;
}

export function propertyTypeOf(streamName: string): PropertyType | undefined {
  if (!streamName.startsWith(PROPERTY_STREAM_PREFIX)) return undefined;
  return PROPERTY_TYPES[streamName.slice(-4).toUpperCase()];
}

export type ScalarField = TextField | "sentOn";

export const SCALAR_PROPERTIES: ReadonlyMap<string, ScalarField> = new Map<
  string,
  ScalarField
>([
  [stream("0C1A001F"), "from"],
  [stream("0037001F"), "subject"],
  [stream("1000001F"), "body"],
  [stream("0E03001F"), "cc"],
  // Client submit time, then message delivery time.
  [stream("00390040"), "sentOn"],
  [stream("0E060040"), "sentOn"],
]);

export const RECIPIENT_ADDRESS = stream("3003001F");

export type AttachmentProperty = "content" | "filename" | "mimeType";

// MAPI tags: 3707/3704 are the long/short filename, 370E the MIME tag (not the reverse).
export const ATTACHMENT_PROPERTIES: ReadonlyMap<string, AttachmentProperty> =
  new Map<string, AttachmentProperty>([
    [stream("37010102"), "content"],
    [stream("3707001F"), "filename"],
    [stream("3704001F"), "filename"],
    [stream("370E001F"), "mimeType"],
  ]);

export function isRecipientGroup(name: string): boolean {
  return name.startsWith(RECIPIENT_GROUP_PREFIX);
}

export function isAttachmentGroup(name: string): boolean {
  return name.startsWith(ATTACHMENT_GROUP_PREFIX);
}
