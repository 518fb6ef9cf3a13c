import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  attachmentFilename,
  createAttachmentSink,
  extensionFor,
  sanitizeFilename,
  storeAttachment,
} from "../../src/storage/index.js";

const GROUP = "__attach_version1.0_#0000000A";

describe("attachmentFilename", () => {
  it("replaces forbidden characters with periods and adds no extension", () => {
    expect(
      attachmentFilename({ filename: "bad:name.pdf", mimeType: "image/png" }, GROUP)
    ).toBe("bad.name.pdf");
  });

  it("synthesizes a name from the group entry and the MIME type", () => {
    expect(attachmentFilename({ mimeType: "image/png" }, GROUP)).toBe(
      "attachment_0000000A.png"
    );
  });

  it("falls back to .bin for unknown or missing MIME types", () => {
    expect(attachmentFilename({ mimeType: "application/zip" }, GROUP)).toBe(
      "attachment_0000000A.bin"
    );
    expect(attachmentFilename({}, GROUP)).toBe("attachment_0000000A.bin");
  });

  it("does not treat object prototype names as known MIME types", () => {
    expect(attachmentFilename({ mimeType: "toString" }, GROUP)).toBe(
      "attachment_0000000A.bin"
    );
    expect(extensionFor("constructor")).toBe(".bin");
    expect(extensionFor("__proto__")).toBe(".bin");
  });

  it("appends an extension to a declared name without a period", () => {
    expect(attachmentFilename({ filename: "report", mimeType: "application/pdf" }, GROUP)).toBe(
      "report.pdf"
    );
  });

  it("treats an empty declared name as missing", () => {
    expect(attachmentFilename({ filename: "", mimeType: "text/plain" }, GROUP)).toBe(
      "attachment_0000000A.txt"
    );
  });

  it("counts a period produced by sanitizing as an extension", () => {
    expect(attachmentFilename({ filename: "a/b", mimeType: "image/jpeg" }, GROUP)).toBe("a.b");
  });
});

describe("sanitizeFilename", () => {
  it("replaces each forbidden character", () => {
    expect(sanitizeFilename('<a>:"b"/c\\d|e?f*')).toBe(".a...b..c.d.e.f.");
  });
});

describe("extensionFor", () => {
  it("maps the known MIME types", () => {
    expect(extensionFor("application/pdf")).toBe(".pdf");
    expect(extensionFor("text/plain")).toBe(".txt");
    expect(extensionFor("image/jpeg")).toBe(".jpg");
    expect(extensionFor("image/png")).toBe(".png");
    expect(extensionFor("application/msword")).toBe(".doc");
  });
});

describe("storeAttachment", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "mailsift-storage-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the bytes and returns the filename", async () => {
    const name = await storeAttachment(dir, "note.txt", Buffer.from("hello attachment"));

    expect(name).toBe("note.txt");
    expect((await readFile(join(dir, "note.txt"))).toString()).toBe("hello attachment");
  });

  it("overwrites a file with the same name", async () => {
    await writeFile(join(dir, "note.txt"), "old");
    await storeAttachment(dir, "note.txt", Buffer.from("new"));

    expect((await readFile(join(dir, "note.txt"))).toString()).toBe("new");
  });

  it("names and writes attachments through the sink", async () => {
    const sink = createAttachmentSink(dir);
    const name = await sink({ content: Buffer.from([1, 2, 3]), mimeType: "image/png" }, GROUP);

    expect(name).toBe("attachment_0000000A.png");
    expect(await readFile(join(dir, name))).toEqual(Buffer.from([1, 2, 3]));
  });

  it("rejects when the directory does not exist", async () => {
    await expect(
      storeAttachment(join(dir, "missing"), "note.txt", Buffer.from("x"))
    ).rejects.toThrow(/ENOENT/);
  });
});
