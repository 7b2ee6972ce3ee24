/**
 * Terminal actions: flags that run a callback as soon as they are seen,
 * e.g. `--version`. By default the parse stops there, before required
 * siblings are checked.
 */
import type { Command, Option } from 'commander';
import { Argument, type ActionCallback } from '../model/argument.js';
import type { Namespace } from '../model/namespace.js';

export interface ActionOptions {
  /** Field name; defaults to the child key */
  name?: string;
  help?: string;
  /** Stop parsing after the callback (default true) */
  exitImmediately?: boolean;
}

/**
 * Wrap a callback as a terminal field.
 *
 *   children: {
 *     version: action(() => { console.log('2.0'); }),
 *   }
 *
 * The callback receives the options parsed so far at its level. Its numeric
 * return value becomes the exit status.
 */
export function action(callback: ActionCallback, options: ActionOptions = {}): Argument {
  return new Argument({
    name: options.name,
    help: options.help,
    action: {
      callback,
      exitImmediately: options.exitImmediately ?? true,
    },
  });
}

/**
 * Raised from inside commander's option event to abandon the parse.
 */
export class ActionSignal extends Error {
  constructor(
    readonly action: string,
    readonly result: unknown
  ) {
    super(`Action '${action}' ended parsing`);
    this.name = 'ActionSignal';
  }

  get exitCode(): number {
    return typeof this.result === 'number' ? this.result : 0;
  }
}

/**
 * Hook an action field onto its commander option. commander emits
 * `option:<name>` while it walks the tokens, before positional and mandatory
 * checks run.
 */
export function attachAction(
  command: Command,
  option: Option,
  field: { name: string; argument: Argument },
  snapshot: () => Namespace,
  record: (result: unknown) => void
): void {
  const registered = field.argument.action;
  if (!registered) return;

  command.on(`option:${option.name()}`, () => {
    const result = registered.callback(snapshot());
    if (registered.exitImmediately) {
      throw new ActionSignal(field.name, result);
    }
    record(result);
  });
}
