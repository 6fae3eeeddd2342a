import { describe, it, expect, afterEach, vi } from 'vitest';

import { configure, resetConfig } from '../../config';
import { InvariantViolationError } from '../../errors';
import { MySQLFlavor } from '../../flavor/mysql-flavor';
import { PostgreSQLFlavor } from '../../flavor/postgresql-flavor';
import { SQLServerFlavor } from '../../flavor/sqlserver-flavor';
import { Args } from '../args';
import { InsertBuilder } from '../insert-builder';
import { list, raw } from '../markers';

const mysql = new MySQLFlavor();
const postgresql = new PostgreSQLFlavor();
const sqlserver = new SQLServerFlavor();

describe('Args', () => {
  afterEach(() => {
    resetConfig();
  });

  describe('add', () => {
    it('should return sequential tokens', () => {
      const args = new Args(mysql);
      expect(args.add('a')).toBe('$0');
      expect(args.add('b')).toBe('$1');
      expect(args.size).toBe(2);
    });

    it('should accept any value without inspecting it', () => {
      const args = new Args(mysql);
      expect(args.add(undefined)).toBe('$0');
      expect(args.add(Symbol('opaque'))).toBe('$1');
    });
  });

  describe('compileWithFlavor', () => {
    it('should write ? placeholders for MySQL', () => {
      const args = new Args(mysql);
      const template = `a = ${args.add(1)} AND b = ${args.add(2)}`;
      expect(args.compile(template)).toEqual({ sql: 'a = ? AND b = ?', args: [1, 2] });
    });

    it('should write numbered placeholders for PostgreSQL and SQL Server', () => {
      const args = new Args(mysql);
      const template = `a = ${args.add(1)} AND b = ${args.add(2)}`;
      expect(args.compileWithFlavor(template, postgresql)).toEqual({
        sql: 'a = $1 AND b = $2',
        args: [1, 2],
      });
      expect(args.compileWithFlavor(template, sqlserver)).toEqual({
        sql: 'a = @p1 AND b = @p2',
        args: [1, 2],
      });
    });

    it('should order args by first occurrence in the template', () => {
      const args = new Args(postgresql);
      const a = args.add('a');
      const b = args.add('b');
      expect(args.compile(`${b}, ${a}`)).toEqual({ sql: '$1, $2', args: ['b', 'a'] });
    });

    it('should reuse the ordinal of a repeated token for numbered flavors', () => {
      const args = new Args(postgresql);
      const x = args.add('x');
      expect(args.compile(`${x} OR ${x}`)).toEqual({ sql: '$1 OR $1', args: ['x'] });
    });

    it('should repeat the value of a repeated token for ? flavors', () => {
      const args = new Args(mysql);
      const x = args.add('x');
      expect(args.compile(`${x} OR ${x}`)).toEqual({ sql: '? OR ?', args: ['x', 'x'] });
    });

    it('should skip registered values that never occur', () => {
      const args = new Args(mysql);
      args.add(1);
      const second = args.add(2);
      expect(args.compile(`n = ${second}`)).toEqual({ sql: 'n = ?', args: [2] });
    });

    it('should unescape $$ and keep a lone $', () => {
      const args = new Args(mysql);
      args.add(1);
      expect(args.compile('price$$ = $0 AND note = $x$').sql).toBe('price$ = ? AND note = $x$');
    });

    it('should throw an invariant violation for unknown tokens', () => {
      const args = new Args(mysql);
      args.add(1);
      expect(() => args.compile('a = $0 AND b = $5')).toThrow(InvariantViolationError);
      expect(() => args.compile('b = $5')).toThrow('Template references unknown placeholder token $5');
    });

    it('should keep the template on the invariant violation', () => {
      const args = new Args(mysql);
      try {
        args.compile('b = $0');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvariantViolationError);
        if (error instanceof InvariantViolationError) {
          expect(error.code).toBe('INVARIANT_VIOLATION');
          expect(error.template).toBe('b = $0');
        }
      }
    });

    it('should number placeholders after initial args', () => {
      const args = new Args(postgresql);
      const v = args.add('v');
      expect(args.compileWithFlavor(`x = ${v}`, postgresql, 'a', 'b')).toEqual({
        sql: 'x = $3',
        args: ['a', 'b', 'v'],
      });
    });

    it('should write raw expressions verbatim', () => {
      const args = new Args(mysql);
      const now = args.add(raw('NOW()'));
      expect(args.compile(`created_at = ${now}`)).toEqual({ sql: 'created_at = NOW()', args: [] });
    });

    it('should expand lists into placeholders', () => {
      const args = new Args(postgresql);
      const ids = args.add(list([1, 2, 3]));
      expect(args.compile(`id IN (${ids})`)).toEqual({
        sql: 'id IN ($1, $2, $3)',
        args: [1, 2, 3],
      });
    });

    it('should compile nested builders in place', () => {
      const args = new Args(postgresql);
      const x = args.add('x');
      const nested = args.add(new InsertBuilder(postgresql).insertInto('t').values(5));
      expect(args.compile(`${x} AND (${nested})`)).toEqual({
        sql: '$1 AND (INSERT INTO t VALUES ($2))',
        args: ['x', 5],
      });
    });

    it('should produce identical output on every call', () => {
      const args = new Args(postgresql);
      const template = `${args.add(1)}, ${args.add(list(['a', 'b']))}`;
      expect(args.compile(template)).toEqual(args.compile(template));
    });

    it('should log compiled statements at debug level', () => {
      const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      configure({ logger, logLevel: 'debug' });

      const args = new Args(mysql);
      args.compile(`a = ${args.add(1)}`);

      expect(logger.debug).toHaveBeenCalledWith('Compiled mysql statement with 1 args: a = ?');
    });
  });

  describe('interpolateWithFlavor', () => {
    it('should write values as literals', () => {
      const args = new Args(mysql);
      const template = `name = ${args.add("O'Reilly")} AND n = ${args.add(3)}`;
      expect(args.interpolateWithFlavor(template, mysql)).toBe("name = 'O\\'Reilly' AND n = 3");
      expect(args.interpolateWithFlavor(template, postgresql)).toBe("name = 'O''Reilly' AND n = 3");
    });

    it('should expand lists and keep raw expressions', () => {
      const args = new Args(mysql);
      const template = `id IN (${args.add(list([1, 'b']))}) AND at = ${args.add(raw('NOW()'))}`;
      expect(args.interpolateWithFlavor(template, mysql)).toBe("id IN (1, 'b') AND at = NOW()");
    });

    it('should interpolate nested builders', () => {
      const args = new Args(mysql);
      const nested = args.add(new InsertBuilder(mysql).insertInto('t').values(null));
      expect(args.interpolateWithFlavor(`(${nested})`, mysql)).toBe('(INSERT INTO t VALUES (NULL))');
    });
  });
});
