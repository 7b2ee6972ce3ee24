/**
 * Inspect command - list the fields deduced for a class or function export.
 */
import { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { deduce } from '../../core/deduction/deduce.js';
import { SourceIntrospector } from '../../core/deduction/source-introspector.js';
import { logger } from '../../utils/logger.js';
import { describeTree } from '../describe.js';
import { HumanFormatter } from '../formatters/human.js';
import { JsonFormatter } from '../formatters/json.js';
import type { IFieldFormatter } from '../formatters/types.js';

interface InspectOptions {
  dialect?: string;
  json?: boolean;
  config?: string;
}

/**
 * Create the inspect command.
 */
export function createInspectCommand(): Command {
  return new Command('inspect')
    .description('List the command-line fields deduced from a class or function')
    .argument('<target>', 'Export to read, as path/to/file.ts#ExportName')
    .option('-d, --dialect <dialect>', 'Documentation dialect: google, numpy, rst or jsdoc')
    .option('--json', 'Output as JSON')
    .option('-c, --config <path>', 'Path to config file')
    .action(async (target: string, options: InspectOptions) => {
      try {
        await runInspect(target, options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

export async function runInspect(target: string, options: InspectOptions): Promise<void> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  logger.setLevel(config.log_level);

  const signature = new SourceIntrospector({ projectRoot }).introspect(target);
  const parser = deduce(signature, { dialect: options.dialect ?? config.docstring_dialect, config });

  const formatter: IFieldFormatter = options.json ? new JsonFormatter() : new HumanFormatter();
  console.log(formatter.format(signature, describeTree(parser)));
}
