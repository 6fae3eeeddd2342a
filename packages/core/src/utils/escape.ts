import { BUILDER_DEFAULTS } from '../constants';

const SIGIL = BUILDER_DEFAULTS.TOKEN_SIGIL;

/**
 * Escape an identifier so it can be written into a builder template.
 *
 * The template reserves `$` for placeholder tokens, so every `$` in a
 * table or column name is doubled. Quoting is left to the caller.
 */
export function escape(identifier: string): string {
  return identifier.replaceAll(SIGIL, SIGIL + SIGIL);
}

export function escapeAll(...identifiers: string[]): string[] {
  return identifiers.map((identifier) => escape(identifier));
}
