/**
 * Append-only buffer used to assemble statement templates.
 */
export class StringBuilder {
  private readonly parts: string[] = [];
  private size = 0;

  get length(): number {
    return this.size;
  }

  write(s: string): this {
    this.parts.push(s);
    this.size += s.length;
    return this;
  }

  /**
   * Write `s` preceded by a single space unless the buffer is still empty
   */
  writeLeading(s: string): this {
    if (this.size > 0) {
      this.write(' ');
    }
    return this.write(s);
  }

  writeJoined(items: readonly string[], separator: string): this {
    return this.write(items.join(separator));
  }

  toString(): string {
    return this.parts.join('');
  }
}
