/**
 * Constants
 *
 * Centralized defaults for builders, flavors and logging.
 */

// ============ Builder Defaults ============

export const BUILDER_DEFAULTS = {
  /** Flavor used by top-level helpers when none is configured */
  FLAVOR: 'mysql',
  /** Verb written by a fresh INSERT builder */
  INSERT_VERB: 'INSERT',
  /** Verb written by replaceInto() */
  REPLACE_VERB: 'REPLACE',
  /** Leading character of placeholder tokens; doubled to write it literally */
  TOKEN_SIGIL: '$',
} as const;

// ============ Logging Defaults ============

export const LOGGING_DEFAULTS = {
  /** Minimum level written by the default logger */
  LEVEL: 'warn',
  /** Prefix of every console line */
  PREFIX: '[sqlweave]',
  /** Maximum SQL length in logs (200 chars) */
  MAX_SQL_LENGTH: 200,
} as const;
