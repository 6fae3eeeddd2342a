/**
 * Argument Compiler
 *
 * Builders never write values into SQL. `add()` stores a value and hands
 * back a placeholder token (`$0`, `$1`, ...) to put into the statement
 * template; a literal `$` in the template is written `$$`. Compilation
 * resolves every token against the chosen flavor.
 *
 * @example
 * ```typescript
 * const args = new Args(FlavorFactory.getFlavor('postgresql'));
 * const id = args.add(42);
 * args.compile(`SELECT * FROM users WHERE id = ${id}`);
 * // { sql: 'SELECT * FROM users WHERE id = $1', args: [42] }
 * ```
 */

import { BUILDER_DEFAULTS } from '../constants';
import { InvariantViolationError } from '../errors';
import { getLogger, truncateSql } from '../logger';
import { StringBuilder } from '../utils/string-builder';
import { isBuilder } from './builder';
import { isList, isRaw } from './markers';

import type { SQLFlavor } from '../flavor/sql-flavor';
import type { BuiltSQL } from './builder';

const SIGIL = BUILDER_DEFAULTS.TOKEN_SIGIL;

function isDigit(code: number): boolean {
  return code >= 48 && code <= 57;
}

interface CompileState {
  args: unknown[];
  /** Token index -> ordinal already assigned, for numbered placeholders */
  ordinals: Map<number, number>;
}

export class Args {
  private readonly values: unknown[] = [];

  constructor(public flavor: SQLFlavor) {}

  /**
   * Number of registered values
   */
  get size(): number {
    return this.values.length;
  }

  /**
   * Register a value and return its placeholder token
   */
  add(value: unknown): string {
    const token = `${SIGIL}${this.values.length}`;
    this.values.push(value);
    return token;
  }

  compile(template: string, ...initialArgs: unknown[]): BuiltSQL {
    return this.compileWithFlavor(template, this.flavor, ...initialArgs);
  }

  /**
   * Resolve every token in `template` into the flavor's placeholder syntax.
   *
   * `args` lists values in the order their tokens first appear in the
   * template, after `initialArgs`. Bare `?` flavors repeat a value for each
   * occurrence of its token; numbered flavors reuse the first ordinal.
   */
  compileWithFlavor(template: string, flavor: SQLFlavor, ...initialArgs: unknown[]): BuiltSQL {
    const state: CompileState = { args: [...initialArgs], ordinals: new Map() };

    const sql = this.scan(template, (index, buf) => {
      this.compileArg(buf, flavor, this.values[index], state, index);
    });

    getLogger().debug(`Compiled ${flavor.name} statement with ${state.args.length} args: ${truncateSql(sql)}`);
    return { sql, args: state.args };
  }

  /**
   * Resolve every token in `template` into an SQL literal
   */
  interpolateWithFlavor(template: string, flavor: SQLFlavor): string {
    return this.scan(template, (index, buf) => {
      this.interpolateArg(buf, flavor, this.values[index]);
    });
  }

  private scan(template: string, resolve: (index: number, buf: StringBuilder) => void): string {
    const buf = new StringBuilder();
    let cursor = 0;

    while (cursor < template.length) {
      const at = template.indexOf(SIGIL, cursor);
      if (at < 0) {
        buf.write(template.slice(cursor));
        break;
      }

      buf.write(template.slice(cursor, at));

      if (template.charAt(at + 1) === SIGIL) {
        buf.write(SIGIL);
        cursor = at + 2;
        continue;
      }

      let end = at + 1;
      while (end < template.length && isDigit(template.charCodeAt(end))) {
        end++;
      }

      if (end === at + 1) {
        buf.write(SIGIL);
        cursor = at + 1;
        continue;
      }

      const digits = template.slice(at + 1, end);
      const index = Number(digits);
      if (index >= this.values.length) {
        throw new InvariantViolationError(
          `Template references unknown placeholder token ${SIGIL}${digits}`,
          template,
        );
      }

      resolve(index, buf);
      cursor = end;
    }

    return buf.toString();
  }

  private compileArg(
    buf: StringBuilder,
    flavor: SQLFlavor,
    value: unknown,
    state: CompileState,
    tokenIndex?: number,
  ): void {
    if (isBuilder(value)) {
      // Nested builders continue numbering after the arguments seen so far
      const nested = value.buildWithFlavor(flavor, ...state.args);
      buf.write(nested.sql);
      state.args = nested.args;
      return;
    }

    if (isRaw(value)) {
      buf.write(value.expr);
      return;
    }

    if (isList(value)) {
      value.values.forEach((item, i) => {
        if (i > 0) {
          buf.write(', ');
        }
        this.compileArg(buf, flavor, item, state);
      });
      return;
    }

    if (flavor.numberedPlaceholders && tokenIndex !== undefined) {
      const ordinal = state.ordinals.get(tokenIndex);
      if (ordinal !== undefined) {
        buf.write(flavor.placeholder(ordinal));
        return;
      }
    }

    state.args.push(value);
    const ordinal = state.args.length;
    if (tokenIndex !== undefined) {
      state.ordinals.set(tokenIndex, ordinal);
    }
    buf.write(flavor.placeholder(ordinal));
  }

  private interpolateArg(buf: StringBuilder, flavor: SQLFlavor, value: unknown): void {
    if (isBuilder(value)) {
      buf.write(value.interpolate(flavor));
      return;
    }

    if (isRaw(value)) {
      buf.write(value.expr);
      return;
    }

    if (isList(value)) {
      value.values.forEach((item, i) => {
        if (i > 0) {
          buf.write(', ');
        }
        this.interpolateArg(buf, flavor, item);
      });
      return;
    }

    buf.write(flavor.escapeValue(value));
  }
}
