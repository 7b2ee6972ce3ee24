import { describe, it, expect } from 'vitest';
import { Argument } from '../../../../src/core/model/argument.js';
import { Parser } from '../../../../src/core/model/parser.js';
import { action, ActionSignal } from '../../../../src/core/actions/action.js';
import type { Namespace } from '../../../../src/core/model/namespace.js';
import { captureOutput } from '../../../fixtures/parsers.js';

function tool(callback: (ns: Namespace) => unknown, exitImmediately = true, output = captureOutput().output): Parser {
  return new Parser({
    name: 'tool',
    output,
    children: {
      path: new Argument({ optional: false }),
      verbose: new Argument({ flag: true }),
      dump: action(callback, { exitImmediately, help: 'Dump the state' }),
    },
  });
}

describe('action', () => {
  it('should build a terminal field', () => {
    const field = action(() => 0, { name: 'version' });

    expect(field.kind).toBe('action');
    expect(field.name).toBe('version');
    expect(field.action?.exitImmediately).toBe(true);
  });

  it('should stop the parse before required positionals are checked', () => {
    const seen: Namespace[] = [];
    const outcome = tool((ns) => {
      seen.push(ns);
      return 0;
    }).parse(['--verbose', '--dump']);

    expect(outcome).toEqual({ kind: 'action-taken', action: 'dump', result: 0, exitCode: 0 });
    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({ path: null, verbose: true });
  });

  it('should use a numeric result as the exit status', () => {
    const outcome = tool(() => 4).parse(['--dump']);

    expect(outcome).toMatchObject({ kind: 'action-taken', exitCode: 4 });
  });

  it('should exit with 0 for other results', () => {
    const outcome = tool(() => 'done').parse(['--dump']);

    expect(outcome).toEqual({ kind: 'action-taken', action: 'dump', result: 'done', exitCode: 0 });
  });

  it('should record the result and keep parsing when not immediate', () => {
    const outcome = tool(() => 'dumped', false).parse(['a.txt', '--dump']);

    expect(outcome).toEqual({
      kind: 'success',
      namespace: { path: 'a.txt', verbose: false, dump: 'dumped' },
      unknown: [],
    });
  });

  it('should leave an action that did not run as null', () => {
    const outcome = tool(() => 'dumped', false).parse(['a.txt']);

    expect(outcome).toMatchObject({ namespace: { dump: null } });
  });

  it('should still check required positionals when not immediate', () => {
    const outcome = tool(() => 'dumped', false).parse(['--dump']);

    expect(outcome).toMatchObject({ kind: 'usage-error', message: "error: missing required argument 'path'" });
  });
});

describe('ActionSignal', () => {
  it('should derive the exit status from the result', () => {
    expect(new ActionSignal('version', 2).exitCode).toBe(2);
    expect(new ActionSignal('version', undefined).exitCode).toBe(0);
  });
});
