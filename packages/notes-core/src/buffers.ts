/**
 * The editor side of a rename: whatever holds note contents in memory.
 */
export interface NoteBufferHost {
  /** Edits for `filename` that have not been written to disk, if any. */
  unsavedContent(filename: string): string | undefined;
  /** Show `filename`, replacing what was read from disk with `content` when given. */
  open(filename: string, content?: string): void;
  close(filename: string): void;
}

interface BufferState {
  content?: string;
  modified: boolean;
}

export class InMemoryBufferHost implements NoteBufferHost {
  private readonly buffers = new Map<string, BufferState>();

  unsavedContent(filename: string): string | undefined {
    const buffer = this.buffers.get(filename);
    if (!buffer || !buffer.modified) {
      return undefined;
    }
    return buffer.content;
  }

  open(filename: string, content?: string): void {
    if (content === undefined) {
      this.buffers.set(filename, { modified: false });
      return;
    }
    this.buffers.set(filename, { content, modified: true });
  }

  close(filename: string): void {
    this.buffers.delete(filename);
  }

  edit(filename: string, content: string): void {
    this.buffers.set(filename, { content, modified: true });
  }

  isOpen(filename: string): boolean {
    return this.buffers.has(filename);
  }

  openFilenames(): string[] {
    return Array.from(this.buffers.keys());
  }
}
