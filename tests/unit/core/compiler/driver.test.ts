import { describe, it, expect } from 'vitest';
import { Argument } from '../../../../src/core/model/argument.js';
import { Parser } from '../../../../src/core/model/parser.js';
import { splitTokens } from '../../../../src/core/compiler/driver.js';
import { compile } from '../../../../src/core/compiler/compiler.js';
import { UsageCodes, type ParseOutcome } from '../../../../src/core/compiler/types.js';
import type { Namespace } from '../../../../src/core/model/namespace.js';
import { InputError } from '../../../../src/utils/errors.js';
import { int } from '../../../../src/core/value-types/rules.js';
import {
  archiver,
  captureOutput,
  type CapturedOutput,
  greetings,
  imageConverter,
  shoppingCart,
} from '../../../fixtures/parsers.js';

function namespaceOf(outcome: ParseOutcome): Namespace {
  if (outcome.kind !== 'success') {
    throw new Error(`expected success, got ${outcome.kind}: ${outcome.kind === 'usage-error' ? outcome.message : ''}`);
  }
  return outcome.namespace;
}

function usageError(outcome: ParseOutcome): { message: string; code: string; exitCode: number } {
  if (outcome.kind !== 'usage-error') {
    throw new Error(`expected usage-error, got ${outcome.kind}`);
  }
  return outcome;
}

describe('parse driver', () => {
  describe('nested parsers', () => {
    it('should parse every level into its own namespace', () => {
      const outcome = imageConverter().parse([
        '--verbose', 'input', 'image.png', 'output', '--format', 'gif', '--scale', '50',
      ]);

      expect(namespaceOf(outcome)).toEqual({
        verbose: true,
        input: { path: 'image.png', format: 'png' },
        output: { format: 'gif', scale: 50 },
      });
    });

    it('should apply defaults of levels given without tokens', () => {
      const outcome = imageConverter().parse(['input', 'a.png', 'output']);

      expect(namespaceOf(outcome)).toEqual({
        verbose: false,
        input: { path: 'a.png', format: 'png' },
        output: { format: 'jpeg', scale: 100 },
      });
    });

    it('should report values outside the choices', () => {
      const captured = captureOutput();
      const outcome = imageConverter(captured.output).parse(['input', 'a.png', '--format', 'bmp', 'output']);

      const error = usageError(outcome);
      expect(error.message).toBe(
        "error: option '--format <format>' argument 'bmp' is invalid. Allowed choices are png, jpeg, gif."
      );
      expect(error.code).toBe('commander.invalidArgument');
      expect(error.exitCode).toBe(1);
    });

    it('should report a missing required command', () => {
      const captured = captureOutput();
      const error = usageError(imageConverter(captured.output).parse(['output']));

      expect(error.message).toBe("error: missing required command 'input'");
      expect(error.code).toBe(UsageCodes.MISSING_COMMAND);
      expect(captured.err[0]).toBe("error: missing required command 'input'\n");
    });

    it('should report commands out of declaration order', () => {
      const captured = captureOutput();
      const error = usageError(imageConverter(captured.output).parse(['output', 'input', 'a.png']));

      expect(error.message).toBe("error: command 'input' must come before 'output'");
      expect(error.code).toBe(UsageCodes.COMMAND_ORDER);
    });

    it('should report a command given twice', () => {
      const captured = captureOutput();
      const error = usageError(imageConverter(captured.output).parse(['input', 'a.png', 'input', 'b.png']));

      expect(error.message).toBe("error: command 'input' given more than once");
      expect(error.code).toBe(UsageCodes.DUPLICATE_COMMAND);
    });

    it('should report a missing positional', () => {
      const captured = captureOutput();
      const error = usageError(imageConverter(captured.output).parse(['input', 'output']));

      expect(error.message).toBe("error: missing required argument 'path'");
    });

    it('should leave an optional child unparsed', () => {
      const inner = new Parser({
        optional: true,
        children: { n: new Argument({ type: int, default: 2 }) },
        produce: (ns) => ({ ...ns, doubled: Number(ns.n) * 2 }),
      });
      const outer = new Parser({ name: 'outer', children: { inner } });

      expect(namespaceOf(outer.parse([]))).toEqual({ inner: { n: null } });
    });
  });

  describe('parallel sets', () => {
    it('should record the selected branch', () => {
      const outcome = archiver().parse(['compress', '--level', '9']);

      expect(namespaceOf(outcome)).toEqual({
        mode: 'compress',
        compress: { level: 9 },
        extract: { dest: null },
      });
    });

    it('should reject two branches of one set', () => {
      const captured = captureOutput();
      const error = usageError(archiver({ output: captured.output }).parse(['compress', 'extract', 'out']));

      expect(error.message).toBe("error: commands 'compress' and 'extract' cannot be used together");
      expect(error.code).toBe(UsageCodes.EXCLUSIVE_COMMANDS);
    });

    it('should require a branch unless the set is optional', () => {
      const captured = captureOutput();
      const error = usageError(archiver({ output: captured.output }).parse([]));

      expect(error.message).toBe('error: missing required command, one of: compress, extract');
      expect(namespaceOf(archiver({ optional: true }).parse([]))).toEqual({
        mode: null,
        compress: { level: null },
        extract: { dest: null },
      });
    });
  });

  describe('variadic fields', () => {
    it('should collect values of zero-or-more options', () => {
      const outcome = shoppingCart().parse(['--products', 'milk', 'bread', '--counts', '3', '1']);

      expect(namespaceOf(outcome)).toEqual({ products: ['milk', 'bread'], counts: [3, 1] });
    });

    it('should give an empty list for a bare zero-or-more option', () => {
      expect(namespaceOf(shoppingCart().parse(['--products']))).toEqual({ products: [], counts: null });
    });

    it('should check asManyAs counts', () => {
      const captured = captureOutput();
      const error = usageError(shoppingCart(captured.output).parse(['--products', 'milk', '--counts', '3', '1']));

      expect(error.message).toBe('error: counts for 2 products provided, expected for 1');
      expect(error.code).toBe(UsageCodes.AS_MANY_AS);
    });

    it('should not count a field that was not given', () => {
      expect(namespaceOf(shoppingCart().parse(['--counts', '3']))).toEqual({ products: null, counts: [3] });
    });

    it('should check fixed counts', () => {
      const captured = captureOutput();
      const parser = new Parser({
        name: 'point',
        output: captured.output,
        children: { at: new Argument({ type: int, nargs: 2 }) },
      });

      expect(namespaceOf(parser.parse(['--at', '1', '2']))).toEqual({ at: [1, 2] });
      expect(usageError(parser.parse(['--at', '1'])).message).toBe("error: option '--at' expects 2 values (got 1)");
    });
  });

  describe('produce hooks', () => {
    it('should run the hook on the assembled namespace', () => {
      const outcome = greetings().parse(['joe', '-c', '2']);

      expect(namespaceOf(outcome)).toEqual({ name: 'joe', count: 2, greetings: 'Hello joe!\nHello joe!\n' });
    });

    it('should run child hooks before their parent', () => {
      const inner = new Parser({
        children: { n: new Argument({ type: int, default: 2 }) },
        produce: (ns) => ({ ...ns, doubled: Number(ns.n) * 2 }),
      });
      const outer = new Parser({
        name: 'outer',
        children: { inner },
        produce: (ns) => ({ ...ns, seen: ns.inner }),
      });

      expect(namespaceOf(outer.parse(['inner', '--n', '5']))).toEqual({
        inner: { n: 5, doubled: 10 },
        seen: { n: 5, doubled: 10 },
      });
    });

    it('should lift translucent fields and run their hooks first', () => {
      const common = new Parser({
        translucent: true,
        children: { verbose: new Argument({ flag: true }) },
        produce: (ns) => ({ ...ns, level: ns.verbose ? 'debug' : 'warn' }),
      });
      const app = new Parser({
        name: 'app',
        children: { common, path: new Argument({ optional: false }) },
        produce: (ns) => ({ ...ns, seen: ns.level }),
      });

      expect(namespaceOf(app.parse(['--verbose', 'x']))).toEqual({
        verbose: true,
        path: 'x',
        level: 'debug',
        seen: 'debug',
      });
    });

    it('should turn InputError into a usage error of the level', () => {
      const captured = captureOutput();
      const parser = new Parser({
        name: 'app',
        output: captured.output,
        children: { count: new Argument({ type: int, default: 1 }) },
        produce: (ns) => {
          if (ns.count === 0) throw new InputError('count must not be zero');
          return ns;
        },
      });

      const error = usageError(parser.parse(['--count', '0']));
      expect(error.message).toBe('error: count must not be zero');
      expect(error.code).toBe(UsageCodes.INVALID_INPUT);
      expect(captured.err[0]).toBe('error: count must not be zero\n');
    });

    it('should let other errors escape', () => {
      const parser = new Parser({
        name: 'app',
        produce: () => {
          throw new RangeError('boom');
        },
      });

      expect(() => parser.parse([])).toThrow(RangeError);
    });
  });

  describe('unknown tokens', () => {
    it('should reject unknown options', () => {
      const captured = captureOutput();
      const error = usageError(greetings(captured.output).parse(['joe', '--cont', '4']));

      expect(error.message).toContain("error: unknown option '--cont'");
      expect(error.code).toBe('commander.unknownOption');
    });

    it('should report a missing positional', () => {
      const captured = captureOutput();
      const error = usageError(greetings(captured.output).parse([]));

      expect(error.message).toBe("error: missing required argument 'name'");
    });

    it('should let produce hooks consume excess tokens in strict mode', () => {
      const parser = new Parser({
        name: 'app',
        children: { level: new Argument({ type: int, default: 1 }) },
        produce: (ns, unknown) => {
          const index = unknown.indexOf('extra');
          if (index >= 0) unknown.splice(index, 1);
          return { ...ns, extra: index >= 0 };
        },
      });

      expect(parser.parse(['extra', '--level', '3'])).toEqual({
        kind: 'success',
        namespace: { level: 3, extra: true },
        unknown: [],
      });
    });

    it('should reject tokens left over after the produce hooks', () => {
      const captured = captureOutput();
      const error = usageError(greetings(captured.output).parse(['joe', 'bob']));

      expect(error.message).toBe('error: unrecognized arguments: bob');
      expect(error.code).toBe(UsageCodes.UNRECOGNIZED);
      expect(captured.err).toEqual(['error: unrecognized arguments: bob\n']);
    });

    it('should hand unknown tokens to produce hooks in known-args mode', () => {
      const parser = new Parser({
        name: 'greet',
        children: { name: new Argument({ optional: false }) },
        produce: (ns, unknown) => {
          const index = unknown.indexOf('--shout');
          if (index >= 0) unknown.splice(index, 1);
          return { ...ns, shout: index >= 0 };
        },
      });

      const outcome = parser.parseKnownArgs(['joe', '--shout', '--other']);
      expect(outcome).toEqual({
        kind: 'success',
        namespace: { name: 'joe', shout: true },
        unknown: ['--other'],
      });
    });
  });

  describe('literal tokens', () => {
    const tool = (output?: CapturedOutput['output']): Parser => new Parser({
      name: 'tool',
      output,
      children: {
        file: new Argument({ optional: false }),
        sub: new Parser({ optional: true, children: { n: new Argument({ type: int }) } }),
      },
    });

    it('should pass a keyword after -- to the level as a value', () => {
      expect(namespaceOf(tool().parse(['--', 'sub']))).toEqual({ file: 'sub', sub: { n: null } });
    });

    it('should still parse the child when its keyword comes first', () => {
      expect(namespaceOf(tool().parse(['a.txt', 'sub', '--n', '2']))).toEqual({ file: 'a.txt', sub: { n: 2 } });
    });

    it('should report the missing positional when only -- is given', () => {
      const captured = captureOutput();
      const error = usageError(tool(captured.output).parse(['--']));

      expect(error.message).toBe("error: missing required argument 'file'");
    });
  });

  describe('help', () => {
    it('should print help and stop with status 0', () => {
      const captured = captureOutput();
      const outcome = imageConverter(captured.output).parse(['--help']);

      expect(outcome).toEqual({ kind: 'action-taken', action: 'help', result: null, exitCode: 0 });
      expect(captured.out.join('')).toContain('Usage: convert [options] [command]');
      expect(captured.out.join('')).toContain('This app converts images');
      expect(captured.out.join('')).toContain('Commands:');
      expect(captured.out.join('')).toContain('input [options] <path>');
    });

    it('should print the help of a child before checking its siblings', () => {
      const captured = captureOutput();
      const outcome = imageConverter(captured.output).parse(['input', '--help']);

      expect(outcome.kind).toBe('action-taken');
      expect(captured.out.join('')).toContain('Usage: convert input [options] <path>');
      expect(captured.out.join('')).toContain('Path to file');
    });
  });
});

describe('splitTokens', () => {
  const level = compile(imageConverter()).root;

  it('should cut tokens at keywords', () => {
    const split = splitTokens(level, ['--verbose', 'input', 'a.png', 'output', '--scale', '5']);

    expect(split.own).toEqual(['--verbose']);
    expect(split.segments).toEqual([
      { keyword: 'input', slot: 0, tokens: ['a.png'] },
      { keyword: 'output', slot: 1, tokens: ['--scale', '5'] },
    ]);
    expect(split.problem).toBeUndefined();
  });

  it('should not treat tokens after -- as keywords', () => {
    const split = splitTokens(level, ['input', '--', 'output']);

    expect(split.segments).toEqual([{ keyword: 'input', slot: 0, tokens: ['--', 'output'] }]);
  });

  it('should keep the first problem only', () => {
    const split = splitTokens(level, ['output', 'input', 'input']);

    expect(split.problem).toEqual({
      message: "error: command 'input' must come before 'output'",
      code: UsageCodes.COMMAND_ORDER,
    });
  });
});
