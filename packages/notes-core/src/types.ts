export interface NoteDescriptor {
  timestamp: string; // YYYYMMDDThhmmss, UTC
  title: string;
  tags: string[];
}

export interface NoteEntry extends NoteDescriptor {
  filename: string;
}

export interface NoteInput {
  title: string;
  tags?: string[];
  /**
   * Either an already formatted `YYYYMMDDThhmmss` id or an instant to format.
   * Omitted for new notes, which take the store clock's current instant.
   */
  timestamp?: string | Date;
}

export interface TagChoice {
  tag: string;
  enabled: boolean; // set on the current note
}

export interface RenameResult {
  from: string;
  to: string;
  renamed: boolean;
  note: NoteEntry;
}

export interface NoteSearchHit {
  filename: string;
  title: string;
  tags: string[];
  line: number; // 1-based
  text: string;
}
