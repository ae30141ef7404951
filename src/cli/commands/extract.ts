/**
 * extract command - print the function and class signatures of a Python file.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { extractFile } from '../../core/extraction/extractor.js';
import { HumanFormatter } from '../formatters/human.js';
import { JsonFormatter } from '../formatters/json.js';
import type { IFormatter } from '../formatters/types.js';

interface ExtractCommandOptions {
  json?: boolean;
  verbose?: boolean;
}

/**
 * Create the extract command.
 */
export function createExtractCommand(): Command {
  return new Command('extract')
    .description('Extract function and class signatures from a Python file')
    .argument('<file>', 'Python source file')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Show docstrings')
    .action(async (file: string, options: ExtractCommandOptions) => {
      try {
        const result = await extractFile(file);
        const formatter: IFormatter = options.json
          ? new JsonFormatter()
          : new HumanFormatter({ verbose: options.verbose });
        console.log(formatter.formatAnalysis(result, file));
      } catch (error) {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }
    });
}
