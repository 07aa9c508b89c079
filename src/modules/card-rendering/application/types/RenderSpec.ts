import type { Point } from '../../domain/services/TextLayout';

/**
 * How personalized text is placed on a template
 */
export interface RenderSpec {
  /** Top-left corner of the text; see TextLayout for how centering overrides it */
  position: Point;
  fontSize: number;
  /** Hex string, 3 or 6 digits, leading '#' optional */
  fontColor: string;
  customFontPath?: string;
  centerAlign: boolean;
  /** Split the text on line breaks and center every line */
  multiline: boolean;
}

/**
 * Where to persist a rendered card
 */
export interface SaveTarget {
  outputDir: string;
  fileName: string;
}

export interface RenderResult {
  /** Encoded JPEG */
  imageBytes: Buffer;
  /** null when the card was not saved */
  savedPath: string | null;
}
