import { z } from 'zod';
import builtinFontData from '../../config/bitmap-font-5x7.json';

// eslint-disable-next-line @typescript-eslint/naming-convention -- Zod schemas use PascalCase by convention
const BitmapFontDataSchema = z.object({
  name: z.string(),
  glyphWidth: z.number().int().positive(),
  glyphHeight: z.number().int().positive(),
  scale: z.number().int().positive(),
  letterSpacing: z.number().int().nonnegative(),
  fallbackGlyph: z.string().length(1),
  glyphs: z.record(z.array(z.string())),
});

export type BitmapFontData = z.infer<typeof BitmapFontDataSchema>;

/**
 * Anything that can fill an axis-aligned rectangle in the current colour.
 * A canvas 2D context satisfies this.
 */
export interface RectangleSink {
  fillRect(x: number, y: number, width: number, height: number): void;
}

/**
 * BitmapFont - fixed-size pixel font drawn as filled squares
 *
 * Last tier of the font fallback chain: it needs no font file and no system
 * font, so text is always drawn. Its size is fixed; the requested font size
 * is not applied to it.
 *
 * Glyph rows are strings where '#' is an on pixel and anything else is off.
 * Characters without a glyph are drawn with the fallback glyph.
 */
export class BitmapFont {
  public readonly name: string;
  private readonly glyphs: Map<string, boolean[][]>;
  private readonly fallback: boolean[][];
  private readonly glyphWidth: number;
  private readonly glyphHeight: number;
  private readonly scale: number;
  private readonly letterSpacing: number;

  public constructor(data: BitmapFontData) {
    const parsed = BitmapFontDataSchema.parse(data);

    this.name = parsed.name;
    this.glyphWidth = parsed.glyphWidth;
    this.glyphHeight = parsed.glyphHeight;
    this.scale = parsed.scale;
    this.letterSpacing = parsed.letterSpacing;
    this.glyphs = new Map();

    for (const [character, rows] of Object.entries(parsed.glyphs)) {
      if (rows.length !== parsed.glyphHeight || rows.some((row) => row.length !== parsed.glyphWidth)) {
        throw new Error(
          `Glyph "${character}" of font ${parsed.name} must be ${parsed.glyphWidth}x${parsed.glyphHeight}`
        );
      }
      this.glyphs.set(
        character,
        rows.map((row) => Array.from(row, (cell) => cell === '#'))
      );
    }

    const fallback = this.glyphs.get(parsed.fallbackGlyph);
    if (!fallback) {
      throw new Error(`Fallback glyph "${parsed.fallbackGlyph}" missing from font ${parsed.name}`);
    }
    this.fallback = fallback;
  }

  /**
   * The font shipped with the package
   */
  public static builtin(): BitmapFont {
    return new BitmapFont(builtinFontData);
  }

  /**
   * Horizontal distance from one glyph origin to the next, in pixels
   */
  public get advance(): number {
    return (this.glyphWidth + this.letterSpacing) * this.scale;
  }

  /**
   * Height of one line of text, in pixels
   */
  public get lineHeight(): number {
    return this.glyphHeight * this.scale;
  }

  /**
   * Width of the drawn text, without trailing letter spacing
   */
  public measure(text: string): number {
    const count = Array.from(text).length;
    if (count === 0) {
      return 0;
    }
    return count * this.advance - this.letterSpacing * this.scale;
  }

  /**
   * Draws text with its top-left corner at (x, y)
   */
  public draw(sink: RectangleSink, text: string, x: number, y: number): void {
    let originX = x;
    for (const character of Array.from(text)) {
      const glyph = this.glyphs.get(character) ?? this.fallback;
      glyph.forEach((row, rowIndex) => {
        row.forEach((on, columnIndex) => {
          if (on) {
            sink.fillRect(
              originX + columnIndex * this.scale,
              y + rowIndex * this.scale,
              this.scale,
              this.scale
            );
          }
        });
      });
      originX += this.advance;
    }
  }
}
