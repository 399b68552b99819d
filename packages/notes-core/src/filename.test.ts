import { describe, expect, it } from 'vitest';

import { isNotesError } from './errors';
import {
  decodeFilename,
  encodeFilename,
  formatTimestamp,
  isNoteFilename,
  parseNoteInput,
} from './filename';
import type { NoteDescriptor } from './types';

const NOW = new Date('2023-05-04T16:28:25.000Z');

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}

describe('formatTimestamp', () => {
  it('formats UTC to the second', () => {
    expect(formatTimestamp(new Date('2023-05-04T16:28:25.999Z'))).toBe('20230504T162825');
  });

  it('zero-pads every field', () => {
    expect(formatTimestamp(new Date('2024-01-02T03:04:05.000Z'))).toBe('20240102T030405');
  });
});

describe('encodeFilename', () => {
  it('builds timestamp, title slug and sorted tag block', () => {
    expect(
      encodeFilename({ title: 'Configuring Neovim', tags: ['editor', 'tools'], timestamp: NOW }),
    ).toBe('20230504T162825--configuring-neovim__editor_tools.md');
  });

  it('sorts tags before serializing', () => {
    const a = encodeFilename({ title: 'Configuring Neovim', tags: ['editor', 'tools'] }, NOW);
    const b = encodeFilename({ title: 'Configuring Neovim', tags: ['tools', 'editor'] }, NOW);
    expect(a).toBe(b);
  });

  it('omits the tag block when there are no tags', () => {
    expect(encodeFilename({ title: 'Configuring Neovim', tags: [] }, NOW)).toBe(
      '20230504T162825--configuring-neovim.md',
    );
  });

  it('drops tags that normalize to nothing', () => {
    expect(encodeFilename({ title: 'Scratch', tags: ['??', 'Unix'] }, NOW)).toBe(
      '20230504T162825--scratch__unix.md',
    );
  });

  it('takes the current instant when no timestamp is given', () => {
    expect(encodeFilename({ title: 'Hello' }, NOW)).toBe('20230504T162825--hello.md');
  });

  it('keeps an existing timestamp id verbatim', () => {
    expect(encodeFilename({ title: 'Hello', timestamp: '19991231T235959' }, NOW)).toBe(
      '19991231T235959--hello.md',
    );
  });

  it('rejects a malformed timestamp id', () => {
    expect(() => encodeFilename({ title: 'Hello', timestamp: '2023-05-04' }, NOW)).toThrow(
      'Invalid note timestamp: 2023-05-04',
    );
  });

  it('rejects a title with no usable characters', () => {
    const error = captureError(() => encodeFilename({ title: '?!' }, NOW));
    expect(isNotesError(error, 'invalid_title')).toBe(true);
  });
});

describe('decodeFilename', () => {
  it('recovers timestamp, spaced title and tags', () => {
    expect(decodeFilename('20230504T162825--configuring-neovim__editor_tools.md')).toEqual({
      timestamp: '20230504T162825',
      title: 'configuring neovim',
      tags: ['editor', 'tools'],
    });
  });

  it('decodes a note without tags', () => {
    expect(decodeFilename('20230504T162825--configuring-neovim.md')).toEqual({
      timestamp: '20230504T162825',
      title: 'configuring neovim',
      tags: [],
    });
  });

  it('ignores the directory part of a path', () => {
    expect(decodeFilename('/home/someone/notes/20230504T162825--hello__x.md')).toEqual({
      timestamp: '20230504T162825',
      title: 'hello',
      tags: ['x'],
    });
  });

  it('returns undefined for names outside the grammar', () => {
    expect(decodeFilename('README.md')).toBeUndefined();
    expect(decodeFilename('notalog.txt')).toBeUndefined();
    expect(decodeFilename('20230504T162825--hello.txt')).toBeUndefined();
    expect(decodeFilename('20230504T162825--Hello.md')).toBeUndefined();
  });

  it('round-trips slug-valid descriptors', () => {
    const descriptors: NoteDescriptor[] = [
      { timestamp: '20230504T162825', title: 'configuring neovim', tags: ['editor', 'tools'] },
      { timestamp: '20240229T000000', title: 'blåbær', tags: [] },
      { timestamp: '20200101T120000', title: 'a b c', tags: ['høst', 'x1'] },
    ];

    for (const descriptor of descriptors) {
      const filename = encodeFilename(descriptor);
      expect(decodeFilename(filename)).toEqual(descriptor);
    }
  });

  it('re-encodes a decoded note to the same filename', () => {
    const filename = encodeFilename(
      { title: '  Configuring  Neovim!! ', tags: ['Tools', 'editor'] },
      NOW,
    );
    const decoded = decodeFilename(filename);
    expect(decoded).toBeDefined();
    if (decoded) {
      expect(encodeFilename(decoded)).toBe(filename);
    }
  });
});

describe('isNoteFilename', () => {
  it('matches only grammar-conforming names', () => {
    expect(isNoteFilename('20230504T162825--hello.md')).toBe(true);
    expect(isNoteFilename('hello.md')).toBe(false);
  });
});

describe('parseNoteInput', () => {
  it('splits title and tags on commas', () => {
    expect(parseNoteInput('Configuring Neovim, editor ,tools')).toEqual({
      title: 'Configuring Neovim',
      tags: ['editor', 'tools'],
    });
  });

  it('returns no tags for a bare title', () => {
    expect(parseNoteInput('  Just a title ')).toEqual({ title: 'Just a title', tags: [] });
  });

  it('ignores a trailing comma', () => {
    expect(parseNoteInput('Title,')).toEqual({ title: 'Title', tags: [] });
  });
});
