import type { EmailRecord, TextField, Timestamp } from "../types/index.js";

/**
 * Accumulates record fields during one extraction session. `sentOn` keeps
 * the first value it is given; text fields keep the last.
 */
export class RecordBuilder {
  private readonly fields: Partial<Record<TextField, string>> = {};
  private readonly recipients: string[] = [];
  private sentOn: Timestamp | undefined;

  setText(field: TextField, value: string): void {
    this.fields[field] = value;
  }

  /** Returns false when a sent timestamp was already set. */
  setSentOn(value: Timestamp): boolean {
    if (this.sentOn !== undefined) return false;
    this.sentOn = value;
    return true;
  }

  hasSentOn(): boolean {
    return this.sentOn !== undefined;
  }

  addRecipient(address: string): void {
    this.recipients.push(address);
  }

  build(): EmailRecord {
    const record: EmailRecord = {
      from: this.fields.from,
      to: Object.freeze([...this.recipients]),
      sentOn: this.sentOn,
      cc: this.fields.cc,
      subject: this.fields.subject,
      body: this.fields.body,
    };
    return Object.freeze(record);
  }
}

export function emptyRecord(): EmailRecord {
  return new RecordBuilder().build();
}
