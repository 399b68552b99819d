import { describe, expect, it } from 'vitest';

import { formatNoteLink } from './links';

describe('formatNoteLink', () => {
  it('links to a note by its timestamp id', () => {
    expect(formatNoteLink('20230504T162825--configuring-neovim__editor_tools.md')).toBe(
      '[configuring neovim](20230504T162825.id)',
    );
  });

  it('returns undefined for files that are not notes', () => {
    expect(formatNoteLink('README.md')).toBeUndefined();
  });
});
