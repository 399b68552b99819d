export type NotesErrorCode =
  | 'not_a_note'
  | 'invalid_title'
  | 'invalid_tag'
  | 'note_not_found'
  | 'note_exists';

export class NotesError extends Error {
  readonly code: NotesErrorCode;

  constructor(code: NotesErrorCode, message: string) {
    super(message);
    this.name = 'NotesError';
    this.code = code;
  }
}

export function isNotesError(error: unknown, code?: NotesErrorCode): error is NotesError {
  if (!(error instanceof NotesError)) {
    return false;
  }
  return code === undefined || error.code === code;
}

export function isErrnoException(error: unknown, code: string): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    (error as NodeJS.ErrnoException).code === code
  );
}
