import { decodeFilename } from './filename';

/**
 * Markdown link to a note by id, e.g. `[configuring neovim](20230504T162825.id)`.
 */
export function formatNoteLink(filename: string): string | undefined {
  const note = decodeFilename(filename);
  if (!note) {
    return undefined;
  }
  return `[${note.title}](${note.timestamp}.id)`;
}
