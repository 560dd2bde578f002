/**
 * Render command: reads a serialized regexp AST and writes its railroad diagram as SVG.
 */

import * as fs from 'fs';
import * as path from 'path';
import { deserializeAST, formatParseFailure, AstValidationError } from '../../ast';
import { buildDiagram } from '../../diagram';
import { resolveConfig, loadConfigFile, ConfigError } from '../../config';
import { logger } from '../utils/logger';
import { getErrorMessage, wrapError } from '../../utils/error-utils';

/** Input path meaning "read standard input" */
export const STDIN_PATH = '-';

export interface RenderCommandOptions {
  output?: string;
  config?: string;
  padding?: number;
  fontSize?: number;
  lineWidth?: number;
  textColor?: string;
  lineColor?: string;
  literalFill?: string;
  charsetFill?: string;
  escapeFill?: string;
  anchorFill?: string;
  subexpFill?: string;
}

export async function renderCommand(input: string, options: RenderCommandOptions = {}): Promise<void> {
  const { output, config: configPath, ...overrides } = options;
  let source = '';

  try {
    source = await readInput(input);

    const fileConfig = configPath ? loadConfigFile(path.resolve(configPath)) : {};
    if (configPath) {
      logger.debug(`Loaded config from ${path.resolve(configPath)}`);
    }
    const config = resolveConfig(fileConfig, overrides);

    const ast = deserializeAST(source);
    logger.debug(`Rendering ${ast.matches.length} top-level alternative(s)`);
    const svg = buildDiagram(ast, config).render();

    if (output) {
      const outputPath = path.resolve(output);
      fs.writeFileSync(outputPath, svg, 'utf-8');
      logger.success(`Diagram written to ${outputPath}`);
    } else {
      process.stdout.write(svg);
    }
  } catch (error) {
    if (AstValidationError.isAstValidationError(error)) {
      logger.error('Invalid regexp AST');
      logger.log(formatParseFailure(source, error));
    } else if (ConfigError.isConfigError(error)) {
      logger.error(error.message);
    } else {
      logger.error(`Failed to render diagram: ${getErrorMessage(error)}`);
    }
    process.exit(1);
  }
}

async function readInput(input: string): Promise<string> {
  if (input === STDIN_PATH) {
    return readStdin();
  }

  const filePath = path.resolve(input);
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw wrapError(error, `Cannot read ${filePath}`);
  }
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}
