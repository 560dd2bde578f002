/**
 * regex-railroad CLI
 * Renders serialized regexp syntax trees as SVG railroad diagrams.
 *
 * Note: the shebang is added by tsup (see tsup.config.ts).
 */

import { Command, InvalidArgumentError } from 'commander';
import { renderCommand, type RenderCommandOptions } from './commands/render';
import { logger } from './utils/logger';
import { getErrorMessage } from '../utils/error-utils';

// Version is injected at build time by tsup
declare const __CLI_VERSION__: string;
const version = typeof __CLI_VERSION__ !== 'undefined' ? __CLI_VERSION__ : '0.0.0-dev';

function parseNonNegative(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative number.');
  }
  return parsed;
}

const program = new Command();

program
  .name('regex-railroad')
  .description('Render regular expression syntax trees as SVG railroad diagrams')
  .version(version, '-v, --version', 'Output the current version');

program.configureOutput({
  writeErr: (str) => {
    const trimmed = str.replace(/^error:\s*/i, '').trimEnd();
    if (trimmed) {
      logger.error(trimmed);
    }
  },
  writeOut: (str) => process.stdout.write(str),
});

program
  .command('render <input>')
  .description('Render a JSON regexp AST file ("-" for stdin) to SVG')
  .option('-o, --output <file>', 'Write output to file instead of stdout')
  .option('-c, --config <file>', 'JSON file with diagram configuration')
  .option('--padding <pixels>', 'Padding around boxes and the canvas', parseNonNegative)
  .option('--font-size <pixels>', 'Font size (character width follows unless configured)', parseNonNegative)
  .option('--line-width <pixels>', 'Stroke width of connectors', parseNonNegative)
  .option('--text-color <color>', 'Text color')
  .option('--line-color <color>', 'Connector color')
  .option('--literal-fill <color>', 'Fill of literal boxes')
  .option('--charset-fill <color>', 'Fill of character class boxes')
  .option('--escape-fill <color>', 'Fill of escape boxes')
  .option('--anchor-fill <color>', 'Fill of anchor boxes')
  .option('--subexp-fill <color>', 'Fill of outermost group boxes')
  .action(async (input: string, options: RenderCommandOptions) => {
    try {
      await renderCommand(input, options);
    } catch (error) {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

program.on('--help', () => {
  logger.log('');
  logger.log('Examples:');
  logger.log('  $ regex-railroad render pattern.json');
  logger.log('  $ regex-railroad render pattern.json -o pattern.svg');
  logger.log('  $ some-parser "a|b" | regex-railroad render - --font-size 16');
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(getErrorMessage(error));
  process.exit(1);
});
