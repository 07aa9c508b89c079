/**
 * IFontLoader Port Interface
 *
 * Makes a font file available to the drawing backend.
 *
 * Implementations return the family name to draw with, or null when the file
 * is missing or cannot be read as a font. They may also throw; FontResolver
 * treats a throw the same as null.
 */
export interface IFontLoader {
  load(fontPath: string): string | null;
}
