/**
 * System fonts tried, in order, when no custom font is configured or the
 * custom font cannot be loaded.
 *
 * Bare file names are looked up relative to the working directory.
 */
export const DEFAULT_FONT_CANDIDATES: readonly string[] = [
  // Windows
  'arial.ttf',
  'calibri.ttf',
  'times.ttf',
  'C:/Windows/Fonts/arial.ttf',
  'C:/Windows/Fonts/calibri.ttf',
  'C:/Windows/Fonts/times.ttf',

  // macOS
  '/System/Library/Fonts/Arial.ttf',
  '/System/Library/Fonts/Times.ttc',
  '/System/Library/Fonts/Helvetica.ttc',

  // Linux
  '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf',
  '/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf',
  '/usr/share/fonts/truetype/liberation/LiberationSans-Regular.ttf',
];
