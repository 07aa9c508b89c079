/**
 * Pixel position on an image, origin at the top-left corner
 */
export interface Point {
  x: number;
  y: number;
}

/**
 * Extra vertical space between consecutive lines of multi-line text
 */
export const LINE_GUTTER = 10;

/**
 * Splits text on its line-break marker ("\n", or "\r\n")
 */
export function splitLines(text: string): string[] {
  return text.split(/\r?\n/);
}

export interface SingleLineLayoutInput {
  imageWidth: number;
  textWidth: number;
  position: Point;
  centerAlign: boolean;
}

/**
 * Top-left corner for one line of text.
 *
 * Centered: x = (imageWidth - textWidth) / 2 rounded down, y = position.y
 * (position.x is ignored). Otherwise the position is used as given.
 */
export function placeSingleLine(input: SingleLineLayoutInput): Point {
  if (!input.centerAlign) {
    return { x: input.position.x, y: input.position.y };
  }
  return {
    x: Math.floor((input.imageWidth - input.textWidth) / 2),
    y: input.position.y,
  };
}

export interface MultiLineLayoutInput {
  imageWidth: number;
  imageHeight: number;
  lineWidths: readonly number[];
  fontSize: number;
  position: Point;
  centerAlign: boolean;
}

/**
 * Top-left corner of every line of a multi-line block.
 *
 * lineHeight = fontSize + LINE_GUTTER and the block is lineCount * lineHeight
 * tall. Not centered: the block starts at the position as given and every
 * line starts at position.x. Centered: the block starts at position.y when
 * that is positive, otherwise it is centered vertically, and each line is
 * centered horizontally on its own width.
 */
export function placeLines(input: MultiLineLayoutInput): Point[] {
  const lineHeight = input.fontSize + LINE_GUTTER;

  if (!input.centerAlign) {
    return input.lineWidths.map((_lineWidth, index) => ({
      x: input.position.x,
      y: input.position.y + index * lineHeight,
    }));
  }

  const totalHeight = input.lineWidths.length * lineHeight;
  const startY =
    input.position.y > 0
      ? input.position.y
      : Math.floor((input.imageHeight - totalHeight) / 2);

  return input.lineWidths.map((lineWidth, index) => ({
    x: Math.floor((input.imageWidth - lineWidth) / 2),
    y: startY + index * lineHeight,
  }));
}
