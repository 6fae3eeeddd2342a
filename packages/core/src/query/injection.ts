import type { StringBuilder } from '../utils/string-builder';

/**
 * Raw SQL fragments keyed by the checkpoint of a builder's render order.
 *
 * Fragments are written verbatim, in registration order. Placeholder tokens
 * inside a fragment (from `var()`) are still resolved by the compiler.
 */
export class Injection<M extends number = number> {
  private readonly fragments = new Map<M, string[]>();

  sql(marker: M, fragment: string): void {
    const list = this.fragments.get(marker);
    if (list) {
      list.push(fragment);
    } else {
      this.fragments.set(marker, [fragment]);
    }
  }

  writeTo(buf: StringBuilder, marker: M): void {
    const list = this.fragments.get(marker);
    if (!list || list.length === 0) {
      return;
    }
    buf.writeLeading('');
    buf.writeJoined(list, ' ');
  }
}
