/**
 * validate command - run the static checks over a candidate test file.
 */
import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, DEFAULT_CONFIG_PATH } from '../../core/config/loader.js';
import { extractFile, findCallable } from '../../core/extraction/extractor.js';
import type { CallableSignature } from '../../core/extraction/types.js';
import { extractCandidateCode } from '../../core/validation/candidate.js';
import { CodeValidator } from '../../core/validation/engine.js';
import { createResolver } from '../../core/validation/resolvers.js';
import { toValidationTables } from '../../core/validation/tables.js';
import { ErrorCodes, TestsmithError } from '../../utils/errors.js';
import { readSourceFile } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { HumanFormatter } from '../formatters/human.js';
import { JsonFormatter } from '../formatters/json.js';
import type { IFormatter } from '../formatters/types.js';

interface ValidateCommandOptions {
  source?: string;
  target?: string;
  stripFences?: boolean;
  config: string;
  json?: boolean;
  verbose?: boolean;
}

/**
 * Looks up the signature of the function under test, when one is named.
 */
async function loadContext(options: ValidateCommandOptions): Promise<CallableSignature | undefined> {
  if (!options.source && !options.target) return undefined;
  if (!options.source || !options.target) {
    throw new TestsmithError(
      ErrorCodes.UNKNOWN_TARGET,
      '--source and --target must be given together'
    );
  }

  const analysis = await extractFile(options.source);
  const context = findCallable(analysis, options.target);
  if (!context) {
    throw new TestsmithError(
      ErrorCodes.UNKNOWN_TARGET,
      `Target not found in ${options.source}: ${options.target}`,
      { source: options.source, target: options.target }
    );
  }
  return context;
}

/**
 * Create the validate command.
 */
export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Validate a generated pytest candidate without running it')
    .argument('<candidate>', 'Candidate test file')
    .option('-s, --source <file>', 'Python source holding the function under test')
    .option('-t, --target <name>', 'Function under test, as name or Class.method')
    .option('--strip-fences', 'Strip a surrounding ```python fence and <think> block first')
    .option('-c, --config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Debug logging and per-check detail')
    .action(async (candidate: string, options: ValidateCommandOptions) => {
      let isValid: boolean;
      try {
        const projectRoot = process.cwd();
        const config = await loadConfig(projectRoot, options.config);
        logger.setLevel(options.verbose ? 'debug' : config.logging.level);
        logger.setTimestamps(config.logging.timestamps);

        const raw = await readSourceFile(candidate);
        const code = options.stripFences ? extractCandidateCode(raw) : raw;
        const context = await loadContext(options);

        const validator = new CodeValidator({
          tables: toValidationTables(config.validation),
          resolveModule: createResolver(config.dependencies),
        });
        const verdict = validator.validate(code, context);
        logger.debug(`${verdict.findings.length} finding(s) for ${candidate}`);

        const formatter: IFormatter = options.json
          ? new JsonFormatter()
          : new HumanFormatter({ verbose: options.verbose });
        console.log(formatter.formatVerdict(verdict, candidate));
        isValid = verdict.isValid;
      } catch (error) {
        console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
        process.exit(1);
      }

      if (!isValid) {
        process.exit(1);
      }
    });
}
