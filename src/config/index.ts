import * as fs from 'fs';
import { z } from 'zod';
import type { DiagramConfig } from '../diagram/types';
import { DEFAULT_CONFIG } from '../diagram/theme';
import { getErrorMessage } from '../utils/error-utils';
import { ConfigError } from './ConfigError';

export { ConfigError } from './ConfigError';

/** Character advance per point of font size when only the size is overridden */
export const CHAR_WIDTH_RATIO = 0.6;

const length = z.number().finite().nonnegative();
const color = z.string().min(1);

/** Every field optional; unknown keys rejected */
export const diagramConfigSchema = z
  .object({
    padding: length,
    horizontalGap: length,
    verticalGap: length,
    cornerRadius: length,

    fontFamily: z.string().min(1),
    fontSize: length,
    charWidth: length,

    backgroundColor: color,
    textColor: color,
    lineColor: color,
    lineWidth: length,

    literalFill: color,
    charsetFill: color,
    escapeFill: color,
    anchorFill: color,
    subexpFill: color,
    subexpStroke: color,
    subexpColors: z.array(color),
    anyCharFill: color,
    flagsFill: color,
    repeatLabelColor: color,
    recursiveRefFill: color,
    calloutFill: color,
    backtrackControlFill: color,
    conditionalFill: color,
  })
  .partial()
  .strict();

export type DiagramConfigOverrides = z.infer<typeof diagramConfigSchema>;

/**
 * Merges overrides onto the defaults into a new object. Entries set to
 * `undefined` are ignored. When the font size changes and the character
 * width does not, the width is scaled to match.
 */
export function resolveConfig(...layers: Partial<DiagramConfig>[]): DiagramConfig {
  const config: DiagramConfig = { ...DEFAULT_CONFIG, subexpColors: [...DEFAULT_CONFIG.subexpColors] };
  let fontSizeSet = false;
  let charWidthSet = false;

  for (const layer of layers) {
    fontSizeSet ||= layer.fontSize !== undefined;
    charWidthSet ||= layer.charWidth !== undefined;
    Object.assign(config, withoutUndefined(layer));
  }

  if (fontSizeSet && !charWidthSet) {
    config.charWidth = config.fontSize * CHAR_WIDTH_RATIO;
  }
  return config;
}

function withoutUndefined<T extends object>(layer: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key in layer) {
    if (layer[key] !== undefined) out[key] = layer[key];
  }
  return out;
}

/**
 * Reads a JSON configuration file and validates it.
 * @throws ConfigError when the file is unreadable, not JSON, or fails validation
 */
export function loadConfigFile(filePath: string): DiagramConfigOverrides {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${getErrorMessage(error)}`, [], filePath);
  }
  return parseConfig(text, filePath);
}

export function parseConfig(text: string, filePath = '<config>'): DiagramConfigOverrides {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Invalid JSON in ${filePath}: ${getErrorMessage(error)}`, [], filePath);
  }

  const result = diagramConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid config in ${filePath}: ${issues.join('; ')}`, issues, filePath);
  }
  return result.data;
}
