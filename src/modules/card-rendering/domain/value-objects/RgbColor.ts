import { HexColorSchema } from '../../../../shared/validation/schemas';
import type { ILogger } from '../../../../shared/logger';

/**
 * 8-bit red, green, blue triple
 */
export type RgbColor = readonly [red: number, green: number, blue: number];

export const BLACK: RgbColor = [0, 0, 0];

/**
 * Decodes a hex colour string into an RGB triple
 *
 * Accepted forms: "#RRGGBB", "RRGGBB" and the "#RGB" shorthand (each digit
 * doubled, so "#F0A" is "#FF00AA"). A bare three-letter value such as "bad"
 * is not read as shorthand.
 *
 * Never throws: anything else logs a warning and decodes to black.
 *
 * @example
 * hexToRgb('#4b446a', logger); // [75, 68, 106]
 */
export function hexToRgb(hexColor: string, logger: ILogger): RgbColor {
  const parsed = HexColorSchema.safeParse(hexColor);
  if (!parsed.success) {
    logger.warn({
      msg: 'Invalid hex colour, using black as default',
      color: hexColor,
    });
    return BLACK;
  }

  let digits = parsed.data.replace(/^#/, '');
  if (digits.length === 3) {
    digits = digits
      .split('')
      .map((digit) => digit + digit)
      .join('');
  }

  return [
    parseInt(digits.slice(0, 2), 16),
    parseInt(digits.slice(2, 4), 16),
    parseInt(digits.slice(4, 6), 16),
  ];
}

/**
 * CSS form understood by canvas fillStyle
 */
export function toCssColor([red, green, blue]: RgbColor): string {
  return `rgb(${red}, ${green}, ${blue})`;
}
