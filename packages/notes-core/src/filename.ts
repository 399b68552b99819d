import { NotesError } from './errors';
import { normalizeTags, normalizeTitle } from './slug';
import type { NoteDescriptor, NoteInput } from './types';

export const NOTE_EXTENSION = '.md';

export const TIMESTAMP_PATTERN = /^\d{8}T\d{6}$/;

const FILENAME_PATTERN = /^(\d{8}T\d{6})([-0-9a-zæøå]+)([_0-9a-zæøå]*)\.md$/;

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/** `YYYYMMDDThhmmss` in UTC. */
export function formatTimestamp(date: Date): string {
  return (
    pad(date.getUTCFullYear(), 4) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    'T' +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds())
  );
}

function resolveTimestamp(timestamp: string | Date | undefined, now: Date): string {
  if (timestamp === undefined) {
    return formatTimestamp(now);
  }
  if (timestamp instanceof Date) {
    return formatTimestamp(timestamp);
  }
  if (!TIMESTAMP_PATTERN.test(timestamp)) {
    throw new Error(`Invalid note timestamp: ${timestamp}`);
  }
  return timestamp;
}

export function encodeFilename(input: NoteInput, now: Date = new Date()): string {
  const timestamp = resolveTimestamp(input.timestamp, now);

  const title = normalizeTitle(input.title);
  if (!title) {
    throw new NotesError('invalid_title', `Title has no usable characters: "${input.title}"`);
  }

  let filename = `${timestamp}--${title}`;

  const tags = normalizeTags(input.tags);
  if (tags.length > 0) {
    filename += '_';
    for (const tag of tags) {
      filename += `_${tag}`;
    }
  }

  return filename + NOTE_EXTENSION;
}

function baseName(name: string): string {
  const index = Math.max(name.lastIndexOf('/'), name.lastIndexOf('\\'));
  return index === -1 ? name : name.slice(index + 1);
}

/**
 * Parse a note filename back into its descriptor. Returns `undefined` for
 * anything that is not a note; callers use it as a filter.
 */
export function decodeFilename(name: string): NoteDescriptor | undefined {
  const match = FILENAME_PATTERN.exec(baseName(name));
  if (!match) {
    return undefined;
  }

  const [, timestamp = '', titleSlug = '', tagBlock = ''] = match;
  return {
    timestamp,
    title: titleSlug
      .split('-')
      .filter((word) => word.length > 0)
      .join(' '),
    tags: tagBlock.split('_').filter((tag) => tag.length > 0),
  };
}

export function isNoteFilename(name: string): boolean {
  return decodeFilename(name) !== undefined;
}

/**
 * Split a `"title, tag, tag"` line as typed into the new-note prompt.
 */
export function parseNoteInput(line: string): { title: string; tags: string[] } {
  const [title = '', ...tags] = line.trim().split(/\s*,\s*/);
  return { title, tags: tags.filter((tag) => tag.length > 0) };
}
