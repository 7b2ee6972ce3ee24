import { describe, it, expect } from 'vitest';
import { Argument } from '../../../../src/core/model/argument.js';
import { Parser } from '../../../../src/core/model/parser.js';
import { parallel } from '../../../../src/core/model/parallel.js';
import { compile } from '../../../../src/core/compiler/compiler.js';
import { ConstructionError, ErrorCodes } from '../../../../src/utils/errors.js';
import { archiver, imageConverter, shoppingCart } from '../../../fixtures/parsers.js';

function constructionCode(build: () => unknown): string | undefined {
  try {
    build();
  } catch (error) {
    if (error instanceof ConstructionError) return error.code;
    throw error;
  }
  return undefined;
}

describe('compile', () => {
  it('should index every destination by its namespace path', () => {
    const compiled = compile(imageConverter());

    expect([...compiled.pathIndex]).toEqual([
      ['#verbose', 'verbose'],
      ['input#path', 'input.path'],
      ['input#format', 'input.format'],
      ['output#format', 'output.format'],
      ['output#scale', 'output.scale'],
    ]);
  });

  it('should list levels in pre-order', () => {
    const compiled = compile(archiver());

    expect(compiled.levels.map((level) => level.path)).toEqual(['', 'compress', 'extract']);
    expect(compiled.pathIndex.get('#mode')).toBe('mode');
  });

  it('should map keywords to slots', () => {
    const { root } = compile(archiver());

    expect([...root.keywords]).toEqual([['compress', 0], ['extract', 0]]);
    expect(root.slots).toHaveLength(1);
  });

  it('should place options and positionals', () => {
    const { root } = compile(imageConverter());
    const input = root.slots[0];
    if (input?.mode !== 'sequential') throw new Error('expected a sequential slot');

    expect(input.level.fields.map((field) => [field.name, field.placement])).toEqual([
      ['path', 'positional'],
      ['format', 'option'],
    ]);
    expect(input.level.positionalCount).toBe(1);
    expect(input.level.command.name()).toBe('input');
  });

  it('should resolve asManyAs partners', () => {
    const { root } = compile(shoppingCart());
    const counts = root.fields.find((field) => field.name === 'counts');

    expect(counts?.partner?.name).toBe('products');
  });

  it('should link child commands for help without registering them', () => {
    const { root, levels } = compile(imageConverter());
    const input = levels.find((level) => level.path === 'input');

    expect(root.command.commands).toEqual([]);
    expect(input?.command.parent).toBe(root.command);
    expect(root.command.usage()).toBe('[options] [command]');
  });

    it('should name the root command after the parser', () => {
    expect(compile(new Parser()).root.command.name()).toBe('program');
    expect(compile(imageConverter()).root.command.name()).toBe('convert');
  });

  describe('construction errors', () => {
    it('should reject a keyword used twice in the tree', () => {
      const parser = new Parser({
        children: {
          a: new Parser({ children: { b: new Parser() } }),
          b: new Parser(),
        },
      });

      expect(() => compile(parser)).toThrow("Command name 'b' is used at both 'a' and '<root>'");
      expect(constructionCode(() => compile(parser))).toBe(ErrorCodes.DUPLICATE_KEYWORD);
    });

    it('should reject names reserved for help', () => {
      const named = new Parser({ children: { help: new Argument() } });
      const short = new Parser({ children: { host: new Argument({ short: 'h' }) } });

      expect(() => compile(named)).toThrow("'help' cannot be used as a name of argument");
      expect(constructionCode(() => compile(short))).toBe(ErrorCodes.RESERVED_NAME);
    });

    it('should reject a positional after a variadic one', () => {
      const parser = new Parser({
        children: {
          files: new Argument({ optional: false, nargs: '+' }),
          target: new Argument({ optional: false }),
        },
      });

      expect(constructionCode(() => compile(parser))).toBe(ErrorCodes.VARIADIC_NOT_LAST);
    });

    it('should reject asManyAs pointing nowhere', () => {
      const parser = new Parser({ children: { counts: new Argument({ nargs: '*', asManyAs: 'ghost' }) } });

      expect(() => compile(parser)).toThrow("'counts' must be as many as an unknown sibling 'ghost'");
    });

    it('should reject asManyAs cycles', () => {
      const parser = new Parser({
        children: {
          a: new Argument({ nargs: '*', asManyAs: 'b' }),
          b: new Argument({ nargs: '*', asManyAs: 'a' }),
        },
      });

      expect(constructionCode(() => compile(parser))).toBe(ErrorCodes.CYCLIC_AS_MANY_AS);
    });

    it('should reject a lifted name clashing with the parent', () => {
      const common = new Parser({ translucent: true, children: { verbose: new Argument({ flag: true }) } });
      const parser = new Parser({ children: { common, verbose: new Argument({ flag: true }) } });

      expect(constructionCode(() => compile(parser))).toBe(ErrorCodes.DUPLICATE_NAME);
    });

    it('should reject a branch named like a field', () => {
      const parser = new Parser({
        children: {
          compress: new Argument(),
          mode: parallel({ compress: new Parser() }),
        },
      });

      expect(constructionCode(() => compile(parser))).toBe(ErrorCodes.DUPLICATE_NAME);
    });

    it('should reject a parser containing itself', () => {
      const parser = new Parser({ children: { leaf: new Argument() } });
      const children: unknown = Reflect.get(parser, 'children');
      if (children instanceof Map) children.set('self', parser);

      expect(constructionCode(() => compile(parser))).toBe(ErrorCodes.CYCLIC_TREE);
    });

    it('should reject options stored under the same attribute', () => {
      const parser = new Parser({
        children: {
          'dry-run': new Argument({ flag: true }),
          dryRun: new Argument({ default: 'x' }),
        },
      });

      expect(constructionCode(() => compile(parser))).toBe(ErrorCodes.DUPLICATE_NAME);
      expect(() => compile(parser)).toThrow("Options 'dry-run' and 'dryRun' are both stored as 'dryRun'");
    });

    it('should reject a short flag used twice in a level', () => {
      const parser = new Parser({
        children: {
          colour: new Argument({ short: 'c' }),
          count: new Argument({ short: 'c' }),
        },
      });

      expect(constructionCode(() => compile(parser))).toBe(ErrorCodes.DUPLICATE_NAME);
      expect(() => parser.parse(['-c', 'red'])).toThrow(ConstructionError);
    });
  });
});
