import type { Dirent } from 'node:fs';
import { mkdir, readdir, readFile, rename, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { NoteBufferHost } from './buffers';
import { InMemoryBufferHost } from './buffers';
import { isErrnoException, NotesError } from './errors';
import { decodeFilename, encodeFilename, NOTE_EXTENSION } from './filename';
import type { Logger } from './logger';
import { silentLogger } from './logger';
import { compareSlugs, normalizeTag, normalizeTitle } from './slug';
import type {
  NoteDescriptor,
  NoteEntry,
  NoteSearchHit,
  RenameResult,
  TagChoice,
} from './types';

const DEFAULT_SEARCH_LIMIT = 50;

export interface NoteStoreOptions {
  notesDir: string;
  buffers?: NoteBufferHost;
  logger?: Logger;
  clock?: () => Date;
  /** Base for relative note paths. Defaults to `process.cwd()`. */
  cwd?: string;
}

export function formatTagChoice(choice: TagChoice): string {
  return `${choice.enabled ? '☑' : '☐'} ${choice.tag}`;
}

function compareNewestFirst(a: NoteEntry, b: NoteEntry): number {
  if (a.timestamp !== b.timestamp) {
    return compareSlugs(b.timestamp, a.timestamp);
  }
  return compareSlugs(a.filename, b.filename);
}

export class NoteStore {
  readonly notesDir: string;
  private readonly buffers: NoteBufferHost;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private readonly cwd: string;

  constructor(options: NoteStoreOptions) {
    this.notesDir = path.resolve(options.notesDir);
    this.buffers = options.buffers ?? new InMemoryBufferHost();
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
    this.cwd = options.cwd ?? process.cwd();
  }

  // Listing

  async listNoteFiles(): Promise<string[]> {
    let entries: Dirent[] = [];
    try {
      entries = await readdir(this.notesDir, { withFileTypes: true });
    } catch (err) {
      if (isErrnoException(err, 'ENOENT')) {
        return [];
      }
      throw err;
    }

    const files: string[] = [];
    for (const entry of entries) {
      if (!entry.name.endsWith(NOTE_EXTENSION)) {
        continue;
      }
      if (entry.isFile() || (entry.isSymbolicLink() && (await this.isLinkedFile(entry.name)))) {
        files.push(entry.name);
      }
    }
    return files;
  }

  private async isLinkedFile(filename: string): Promise<boolean> {
    try {
      return (await stat(this.filePath(filename))).isFile();
    } catch (err) {
      if (isErrnoException(err, 'ENOENT')) {
        this.logger.debug?.(`[notes] skipping dangling link ${filename}`);
        return false;
      }
      throw err;
    }
  }

  async listNotes(): Promise<NoteEntry[]> {
    const notes: NoteEntry[] = [];
    for (const filename of await this.listNoteFiles()) {
      const note = decodeFilename(filename);
      if (note) {
        notes.push({ filename, ...note });
      }
    }
    return notes.sort(compareNewestFirst);
  }

  async findNotes(query: string): Promise<NoteEntry[]> {
    const terms = query.trim().toLowerCase().split(/\s+/).filter(Boolean);
    const notes = await this.listNotes();
    if (terms.length === 0) {
      return notes;
    }
    return notes.filter((note) => {
      const name = note.filename.toLowerCase();
      return terms.every((term) => name.includes(term));
    });
  }

  async collectTags(): Promise<string[]> {
    const tags = new Set<string>();
    for (const filename of await this.listNoteFiles()) {
      for (const tag of decodeFilename(filename)?.tags ?? []) {
        tags.add(tag);
      }
    }
    return Array.from(tags).sort(compareSlugs);
  }

  /**
   * Every tag the current note can be toggled to: the corpus tags plus the
   * note's own, marked `enabled` when set on the note.
   */
  async tagChoices(current: string): Promise<TagChoice[]> {
    const note = this.requireNote(this.resolveNoteFilename(current));
    const tags = new Set<string>([...(await this.collectTags()), ...note.tags]);

    return Array.from(tags)
      .sort(compareSlugs)
      .map((tag) => ({ tag, enabled: note.tags.includes(tag) }));
  }

  // Path handling

  /**
   * Accepts a bare filename or a path. A path must point into the notes
   * directory.
   */
  resolveNoteFilename(pathOrName: string): string {
    const filename = path.basename(pathOrName);
    if (filename === pathOrName) {
      return filename;
    }

    const directory = path.dirname(path.resolve(this.cwd, pathOrName));
    if (directory !== this.notesDir) {
      throw new NotesError('not_a_note', `Not in a note file: ${pathOrName}`);
    }
    return filename;
  }

  filePath(filename: string): string {
    return path.join(this.notesDir, filename);
  }

  private requireNote(filename: string): NoteDescriptor {
    const note = decodeFilename(filename);
    if (!note) {
      throw new NotesError('not_a_note', `Not in a note file: ${filename}`);
    }
    return note;
  }

  // Metadata changes

  async createNote(params: {
    title: string;
    tags?: string[];
    content?: string;
    timestamp?: string | Date;
  }): Promise<NoteEntry> {
    const filename = encodeFilename(
      {
        title: params.title,
        ...(params.tags ? { tags: params.tags } : {}),
        ...(params.timestamp !== undefined ? { timestamp: params.timestamp } : {}),
      },
      this.clock(),
    );
    const note = this.requireNote(filename);

    await mkdir(this.notesDir, { recursive: true });
    try {
      await writeFile(this.filePath(filename), params.content ?? '', {
        encoding: 'utf-8',
        flag: 'wx',
      });
    } catch (err) {
      if (isErrnoException(err, 'EEXIST')) {
        throw new NotesError('note_exists', `Note already exists: ${filename}`);
      }
      throw err;
    }

    this.buffers.open(filename);
    this.logger.info(`[notes] created ${filename}`);
    return { filename, ...note };
  }

  /**
   * Move a note to a new filename. The filesystem rename is the only step
   * that touches disk; unsaved edits held by the buffer host follow the note
   * to its new name.
   */
  async renameNote(current: string, newFilename: string): Promise<RenameResult> {
    const oldFilename = this.resolveNoteFilename(current);
    if (path.basename(newFilename) !== newFilename) {
      throw new NotesError('not_a_note', `Not a note filename: ${newFilename}`);
    }
    const note = this.requireNote(newFilename);
    const source = this.filePath(oldFilename);
    const target = this.filePath(newFilename);

    const sourceContent = await this.readIfExists(source);
    if (sourceContent === undefined) {
      throw new NotesError('note_not_found', `Note not found: ${oldFilename}`);
    }

    const result = { from: oldFilename, to: newFilename, note: { filename: newFilename, ...note } };
    if (oldFilename === newFilename) {
      this.logger.debug?.(`[notes] ${oldFilename} unchanged`);
      return { ...result, renamed: false };
    }

    const existing = await this.readIfExists(target);
    if (existing !== undefined && existing !== sourceContent) {
      throw new NotesError('note_exists', `Note already exists: ${newFilename}`);
    }

    const unsaved = this.buffers.unsavedContent(oldFilename);
    await rename(source, target);
    this.buffers.open(newFilename, unsaved);
    this.buffers.close(oldFilename);

    this.logger.info(`[notes] renamed ${oldFilename} -> ${newFilename}`);
    if (unsaved !== undefined) {
      this.logger.debug?.(`[notes] carried ${unsaved.length} chars of unsaved edits`);
    }
    return { ...result, renamed: true };
  }

  async toggleTag(current: string, tag: string): Promise<RenameResult> {
    const filename = this.resolveNoteFilename(current);
    const note = this.requireNote(filename);

    const normalized = normalizeTag(tag);
    if (!normalized) {
      throw new NotesError('invalid_tag', `Tag has no usable characters: "${tag}"`);
    }

    const tags = note.tags.includes(normalized)
      ? note.tags.filter((existing) => existing !== normalized)
      : [...note.tags, normalized];

    const next = encodeFilename({ timestamp: note.timestamp, title: note.title, tags });
    return this.renameNote(filename, next);
  }

  async retitle(current: string, newTitle: string): Promise<RenameResult> {
    const filename = this.resolveNoteFilename(current);
    const note = this.requireNote(filename);

    if (!normalizeTitle(newTitle)) {
      throw new NotesError('invalid_title', `Title has no usable characters: "${newTitle}"`);
    }

    const next = encodeFilename({ timestamp: note.timestamp, title: newTitle, tags: note.tags });
    return this.renameNote(filename, next);
  }

  // Content

  async search(query: string, options?: { limit?: number }): Promise<NoteSearchHit[]> {
    const needle = query.trim().toLowerCase();
    if (!needle) {
      return [];
    }

    const limit = options?.limit ?? DEFAULT_SEARCH_LIMIT;
    const hits: NoteSearchHit[] = [];

    for (const note of await this.listNotes()) {
      const content = await this.readIfExists(this.filePath(note.filename));
      if (content === undefined) {
        continue;
      }

      const lines = content.split(/\r?\n/);
      for (const [index, line] of lines.entries()) {
        if (!line.toLowerCase().includes(needle)) {
          continue;
        }
        hits.push({
          filename: note.filename,
          title: note.title,
          tags: note.tags,
          line: index + 1,
          text: line.trim(),
        });
        if (limit > 0 && hits.length >= limit) {
          return hits;
        }
      }
    }

    return hits;
  }

  private async readIfExists(filePath: string): Promise<string | undefined> {
    try {
      return await readFile(filePath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err, 'ENOENT')) {
        return undefined;
      }
      throw err;
    }
  }
}
