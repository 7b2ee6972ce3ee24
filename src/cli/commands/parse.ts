/**
 * Parse command - run a deduced parser over tokens and print the namespace.
 */
import { Command } from 'commander';
import { loadConfig } from '../../core/config/loader.js';
import { deduce } from '../../core/deduction/deduce.js';
import { SourceIntrospector } from '../../core/deduction/source-introspector.js';
import { logger } from '../../utils/logger.js';
import { stringifyYaml } from '../../utils/yaml.js';
import { toJson } from '../formatters/json.js';

interface ParseOptions {
  dialect?: string;
  yaml?: boolean;
  known?: boolean;
  config?: string;
}

/**
 * Create the parse command. Tokens meant for the target parser may follow
 * `--`.
 */
export function createParseCommand(): Command {
  return new Command('parse')
    .description('Parse tokens with the parser deduced from a class or function')
    .argument('<target>', 'Export to read, as path/to/file.ts#ExportName')
    .argument('[tokens...]', 'Command-line tokens for the target')
    .option('-d, --dialect <dialect>', 'Documentation dialect: google, numpy, rst or jsdoc')
    .option('--yaml', 'Output as YAML instead of JSON')
    .option('-k, --known', 'Accept unknown tokens and list them instead of failing')
    .option('-c, --config <path>', 'Path to config file')
    .allowUnknownOption()
    .action(async (target: string, tokens: string[], options: ParseOptions) => {
      try {
        process.exitCode = await runParseCommand(target, tokens, options);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : 'Unknown error');
        process.exit(1);
      }
    });
}

/**
 * Returns the exit status: 0 on success, the parse outcome's otherwise.
 */
export async function runParseCommand(target: string, tokens: string[], options: ParseOptions): Promise<number> {
  const projectRoot = process.cwd();
  const config = await loadConfig(projectRoot, options.config);
  logger.setLevel(config.log_level);

  const signature = new SourceIntrospector({ projectRoot }).introspect(target);
  const parser = deduce(signature, { dialect: options.dialect ?? config.docstring_dialect, config });
  const outcome = options.known ? parser.parseKnownArgs(tokens) : parser.parse(tokens);

  switch (outcome.kind) {
    case 'success':
      console.log(options.yaml ? stringifyYaml(outcome.namespace).trimEnd() : toJson(outcome.namespace));
      if (outcome.unknown.length > 0) logger.warn(`Unrecognized tokens: ${outcome.unknown.join(' ')}`);
      return 0;
    case 'usage-error':
      logger.debug(`usage error ${outcome.code}`);
      return outcome.exitCode;
    case 'action-taken':
      return outcome.exitCode;
  }
}
