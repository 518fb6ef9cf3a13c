import { readFile } from "node:fs/promises";
import CFB from "cfb";

type CfbContainer = ReturnType<typeof CFB.read>;

// Directory entry object types from the compound file header.
const STORAGE = 1;
const STREAM = 2;
const ROOT = 5;

const CFB_SIGNATURE = Buffer.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);

/**
 * A byte source opened from a stream entry. Callers close it before moving
 * on to the next entry.
 */
export interface EntryStream {
  read(): Buffer;
  close(): void;
}

/**
 * A node of a compound container: either a directory (storage) holding an
 * ordered list of children, or a stream holding bytes.
 */
export interface ContainerEntry {
  readonly name: string;
  readonly isDirectory: boolean;
  children(): ContainerEntry[];
  open(): EntryStream;
}

export interface Container {
  readonly root: ContainerEntry;
}

function parentPath(fullPath: string): string {
  const trimmed = fullPath.endsWith("/") ? fullPath.slice(0, -1) : fullPath;
  return trimmed.slice(0, trimmed.lastIndexOf("/") + 1);
}

class CfbStream implements EntryStream {
  private content: Uint8Array | number[] | undefined;

  constructor(content: Uint8Array | number[]) {
    this.content = content;
  }

  read(): Buffer {
    if (this.content === undefined) {
      throw new Error("Stream is closed");
    }
    return Buffer.from(this.content);
  }

  close(): void {
    this.content = undefined;
  }
}

class CfbEntry implements ContainerEntry {
  constructor(
    private readonly tree: CfbTree,
    private readonly position: number
  ) {}

  get name(): string {
    return this.tree.cfb.FileIndex[this.position].name;
  }

  get isDirectory(): boolean {
    const type = this.tree.cfb.FileIndex[this.position].type;
    return type === STORAGE || type === ROOT;
  }

  children(): ContainerEntry[] {
    if (!this.isDirectory) return [];
    const path = this.tree.cfb.FullPaths[this.position];
    return (this.tree.childPositions.get(path) ?? []).map(
      (child) => new CfbEntry(this.tree, child)
    );
  }

  open(): EntryStream {
    if (this.isDirectory) {
      throw new Error(`Entry "${this.name}" is a directory`);
    }
    return new CfbStream(this.tree.cfb.FileIndex[this.position].content ?? []);
  }
}

class CfbTree {
  readonly childPositions = new Map<string, number[]>();

  constructor(readonly cfb: CfbContainer) {
    cfb.FileIndex.forEach((entry, position) => {
      if (entry.type !== STORAGE && entry.type !== STREAM) return;
      const parent = parentPath(cfb.FullPaths[position]);
      const siblings = this.childPositions.get(parent);
      if (siblings) {
        siblings.push(position);
      } else {
        this.childPositions.set(parent, [position]);
      }
    });
  }

  root(): ContainerEntry {
    const position = this.cfb.FileIndex.findIndex((entry) => entry.type === ROOT);
    if (position === -1) {
      throw new Error("Container has no root entry");
    }
    return new CfbEntry(this, position);
  }
}

/**
 * Parse an in-memory compound container. Throws if the bytes do not start
 * with the compound file signature or cannot be read.
 */
export function readContainer(data: Buffer): Container {
  // cfb also reads ZIP and MIME-wrapped files; only compound files are .msg.
  if (!data.subarray(0, CFB_SIGNATURE.length).equals(CFB_SIGNATURE)) {
    throw new Error("Not a compound file: signature mismatch");
  }
  const cfb = CFB.read(data, { type: "buffer" });
  return { root: new CfbTree(cfb).root() };
}

export async function openContainer(filePath: string): Promise<Container> {
  return readContainer(await readFile(filePath));
}

/**
 * Open, fully read and close a stream entry.
 */
export function readEntry(entry: ContainerEntry): Buffer {
  const stream = entry.open();
  try {
    return stream.read();
  } finally {
    stream.close();
  }
}
