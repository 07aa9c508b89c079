import { IANAZone } from 'luxon';
import { z } from 'zod';
import { ConfigError } from '../../domain/errors/ConfigError';

const flag = (defaultValue: boolean) =>
  z
    .preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(['true', 'false']).default(defaultValue ? 'true' : 'false')
    )
    .transform((value) => value === 'true');

const coordinate = (defaultValue: number) => z.coerce.number().int().default(defaultValue);

const fontSize = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);

/**
 * Zod schema for the process environment
 *
 * Defaults fit the stock birthday and anniversary card templates.
 * Blank values are treated as unset.
 */
// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const EnvSchema = z.object({
  CSV_FILE: z.string().default('employees.csv'),
  OUTPUT_FOLDER: z.string().default('output'),

  BIRTHDAY_CARD: z.string(),
  BIRTHDAY_TEXT_X: coordinate(50),
  BIRTHDAY_TEXT_Y: coordinate(300),
  BIRTHDAY_FONT_SIZE: fontSize(64),
  BIRTHDAY_FONT_COLOR: z.string().default('#4b446a'),
  BIRTHDAY_FONT_PATH: z.string().optional(),
  BIRTHDAY_CENTER_ALIGN: flag(false),

  ANNIVERSARY_CARD: z.string(),
  ANNIVERSARY_TEXT_X: coordinate(0),
  ANNIVERSARY_TEXT_Y: coordinate(200),
  ANNIVERSARY_FONT_SIZE: fontSize(72),
  ANNIVERSARY_FONT_COLOR: z.string().default('#72719f'),
  ANNIVERSARY_FONT_PATH: z.string().optional(),
  ANNIVERSARY_CENTER_ALIGN: flag(true),

  CELEBRATION_TIMEZONE: z
    .string()
    .refine((zone) => IANAZone.isValidZone(zone), 'must be a valid IANA time zone')
    .optional(),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.string().default('development'),
});

export interface CardConfig {
  templatePath: string;
  position: { x: number; y: number };
  fontSize: number;
  fontColor: string;
  customFontPath?: string;
  centerAlign: boolean;
}

export interface AppConfig {
  employeeFile: string;
  outputDir: string;
  cards: {
    birthday: CardConfig;
    anniversary: CardConfig;
  };
  timezone?: string;
  logLevel: string;
  nodeEnv: string;
}

/**
 * Reads the application configuration from environment variables
 *
 * **Settings:**
 * - CSV_FILE, OUTPUT_FOLDER: employee file and output folder
 * - BIRTHDAY_CARD, ANNIVERSARY_CARD: template images (required)
 * - {BIRTHDAY,ANNIVERSARY}_TEXT_X / _TEXT_Y / _FONT_SIZE / _FONT_COLOR /
 *   _FONT_PATH / _CENTER_ALIGN: text styling per card
 * - CELEBRATION_TIMEZONE: zone that decides which day is "today"
 * - LOG_LEVEL, NODE_ENV: logger
 *
 * @throws ConfigError listing every invalid or missing setting
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlankValues(env));
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid configuration',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const settings = parsed.data;
  return {
    employeeFile: settings.CSV_FILE,
    outputDir: settings.OUTPUT_FOLDER,
    cards: {
      birthday: {
        templatePath: settings.BIRTHDAY_CARD,
        position: { x: settings.BIRTHDAY_TEXT_X, y: settings.BIRTHDAY_TEXT_Y },
        fontSize: settings.BIRTHDAY_FONT_SIZE,
        fontColor: settings.BIRTHDAY_FONT_COLOR,
        customFontPath: settings.BIRTHDAY_FONT_PATH,
        centerAlign: settings.BIRTHDAY_CENTER_ALIGN,
      },
      anniversary: {
        templatePath: settings.ANNIVERSARY_CARD,
        position: { x: settings.ANNIVERSARY_TEXT_X, y: settings.ANNIVERSARY_TEXT_Y },
        fontSize: settings.ANNIVERSARY_FONT_SIZE,
        fontColor: settings.ANNIVERSARY_FONT_COLOR,
        customFontPath: settings.ANNIVERSARY_FONT_PATH,
        centerAlign: settings.ANNIVERSARY_CENTER_ALIGN,
      },
    },
    timezone: settings.CELEBRATION_TIMEZONE,
    logLevel: settings.LOG_LEVEL,
    nodeEnv: settings.NODE_ENV,
  };
}

function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}
