import type { ContainerEntry, EntryStream } from "../../src/msg/container.js";

export interface StreamTracker {
  open: number;
  maxOpen: number;
  opened: string[];
}

export function createTracker(): StreamTracker {
  return { open: 0, maxOpen: 0, opened: [] };
}

export function stream(
  name: string,
  content: Buffer | Error,
  tracker: StreamTracker = createTracker()
): ContainerEntry {
  return {
    name,
    isDirectory: false,
    children: () => [],
    open(): EntryStream {
      tracker.open++;
      tracker.maxOpen = Math.max(tracker.maxOpen, tracker.open);
      tracker.opened.push(name);
      return {
        read() {
          if (content instanceof Error) throw content;
          return content;
        },
        close() {
          tracker.open--;
        },
      };
    },
  };
}

export function directory(name: string, children: ContainerEntry[]): ContainerEntry {
  return {
    name,
    isDirectory: true,
    children: () => children,
    open() {
      throw new Error(`Entry "${name}" is a directory`);
    },
  };
}
