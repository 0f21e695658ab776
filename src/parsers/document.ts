/**
 * SourceDocument - an arena of source lines with stable ids.
 *
 * Lines present when the document is created get ids equal to their original
 * 0-based index, so line numbers from a SourceStructure can be used as ids
 * directly. Inserted lines get fresh ids. Edits address ids, never offsets,
 * so they can be applied in any order. The line ending of the original
 * content is kept when the document is written back.
 */

export type LineId = number;

/** Split on LF or CRLF */
export function splitLines(content: string): string[] {
  return content.split(/\r?\n/);
}

interface LineEntry {
  id: LineId;
  text: string;
}

export class SourceDocument {
  private entries: LineEntry[];
  private nextId: LineId;
  private dirty = false;

  private constructor(lines: string[], readonly eol: string) {
    this.entries = lines.map((text, id) => ({ id, text }));
    this.nextId = lines.length;
  }

  static fromContent(content: string): SourceDocument {
    return new SourceDocument(splitLines(content), content.includes('\r\n') ? '\r\n' : '\n');
  }

  get changed(): boolean {
    return this.dirty;
  }

  get length(): number {
    return this.entries.length;
  }

  has(id: LineId): boolean {
    return this.entries.some((entry) => entry.id === id);
  }

  /** Current 0-based position of a line */
  indexOf(id: LineId): number {
    const index = this.entries.findIndex((entry) => entry.id === id);
    if (index === -1) {
      throw new Error(`Line ${id} is no longer in the document`);
    }
    return index;
  }

  idAt(index: number): LineId {
    const entry = this.entries[index];
    if (!entry) {
      throw new Error(`No line at position ${index}`);
    }
    return entry.id;
  }

  text(id: LineId): string {
    return this.entries[this.indexOf(id)].text;
  }

  /** Ids in current document order */
  ids(): LineId[] {
    return this.entries.map((entry) => entry.id);
  }

  lines(): string[] {
    return this.entries.map((entry) => entry.text);
  }

  /** Id of the line before `id`, or undefined at the top of the document */
  previous(id: LineId): LineId | undefined {
    const index = this.indexOf(id);
    return index > 0 ? this.entries[index - 1].id : undefined;
  }

  next(id: LineId): LineId | undefined {
    const index = this.indexOf(id);
    return index < this.entries.length - 1 ? this.entries[index + 1].id : undefined;
  }

  insertAfter(id: LineId, lines: string[]): LineId[] {
    return this.insertAt(this.indexOf(id) + 1, lines);
  }

  insertBefore(id: LineId, lines: string[]): LineId[] {
    return this.insertAt(this.indexOf(id), lines);
  }

  replace(id: LineId, text: string): void {
    const entry = this.entries[this.indexOf(id)];
    if (entry.text !== text) {
      entry.text = text;
      this.dirty = true;
    }
  }

  /** Remove lines; ids no longer present are ignored */
  remove(ids: Iterable<LineId>): void {
    const doomed = new Set(ids);
    const before = this.entries.length;
    this.entries = this.entries.filter((entry) => !doomed.has(entry.id));
    if (this.entries.length !== before) {
      this.dirty = true;
    }
  }

  /** Ids from `from` to `to` inclusive, in document order */
  range(from: LineId, to: LineId): LineId[] {
    const start = this.indexOf(from);
    const end = this.indexOf(to);
    return this.entries.slice(Math.min(start, end), Math.max(start, end) + 1).map((entry) => entry.id);
  }

  toString(): string {
    return this.lines().join(this.eol);
  }

  private insertAt(index: number, lines: string[]): LineId[] {
    const created = lines.map((text) => ({ id: this.nextId++, text }));
    this.entries.splice(index, 0, ...created);
    if (created.length > 0) {
      this.dirty = true;
    }
    return created.map((entry) => entry.id);
  }
}
