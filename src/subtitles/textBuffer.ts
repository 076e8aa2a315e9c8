/**
 * The single owned text of a document plus its cursor.
 *
 * Edits go through `replace`, which moves the cursor like an editor marker:
 * a cursor after the edited range shifts with it, a cursor inside it is kept
 * within the replacement.
 */
export class TextBuffer {
  private content: string;
  private cursor: number;

  constructor(text: string = '', point: number = 0) {
    this.content = text;
    this.cursor = this.clamp(point);
  }

  get text(): string {
    return this.content;
  }

  get length(): number {
    return this.content.length;
  }

  get point(): number {
    return this.cursor;
  }

  /**
   * Moves the cursor, clamped to the buffer
   * @returns The new cursor offset
   */
  goto(offset: number): number {
    this.cursor = this.clamp(offset);
    return this.cursor;
  }

  /**
   * Replaces the range [start, end) with `replacement`
   */
  replace(start: number, end: number, replacement: string): void {
    const from = this.clamp(Math.min(start, end));
    const to = this.clamp(Math.max(start, end));

    this.content = this.content.slice(0, from) + replacement + this.content.slice(to);

    if (this.cursor >= to) {
      this.cursor += replacement.length - (to - from);
    } else if (this.cursor > from) {
      this.cursor = Math.min(this.cursor, from + replacement.length);
    }
  }

  insert(offset: number, text: string): void {
    this.replace(offset, offset, text);
  }

  /**
   * Rewrites the whole buffer and places the cursor
   */
  reset(text: string, point: number): void {
    this.content = text;
    this.cursor = this.clamp(point);
  }

  private clamp(offset: number): number {
    if (!Number.isFinite(offset)) return 0;
    return Math.min(Math.max(Math.trunc(offset), 0), this.content.length);
  }
}
