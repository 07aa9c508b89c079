import { BitmapFont } from './BitmapFont';
import type { IFontLoader } from '../../application/ports/IFontLoader';
import { DEFAULT_FONT_CANDIDATES } from '../../config/font-candidates';
import { firstSuccess } from '../../../../shared/utils/firstSuccess';
import { describeError, type ILogger } from '../../../../shared/logger';

export interface VectorFontHandle {
  readonly kind: 'vector';
  readonly tier: 'custom' | 'system';
  /** Family name registered with the drawing backend */
  readonly family: string;
  /** Font file the family was loaded from */
  readonly source: string;
  readonly size: number;
}

export interface BitmapFontHandle {
  readonly kind: 'bitmap';
  readonly tier: 'builtin';
  readonly font: BitmapFont;
  /** Always the bitmap font's own line height */
  readonly size: number;
}

/**
 * A font ready to draw with
 */
export type FontHandle = VectorFontHandle | BitmapFontHandle;

/**
 * FontResolver - always produces a usable font
 *
 * **Fallback Chain:**
 * 1. The custom font path, when given and loadable
 * 2. The first loadable entry of the system font candidates
 * 3. The built-in bitmap font (fixed size)
 *
 * Never throws. Each resolution logs the tier that succeeded, which is the
 * first thing to check when cards render in an unexpected typeface.
 */
export class FontResolver {
  public constructor(
    private readonly fontLoader: IFontLoader,
    private readonly logger: ILogger,
    private readonly candidates: readonly string[] = DEFAULT_FONT_CANDIDATES,
    private readonly fallbackFont: BitmapFont = BitmapFont.builtin()
  ) {}

  public resolve(customPath: string | undefined, size: number): FontHandle {
    if (customPath) {
      const family = this.tryLoad(customPath);
      if (family) {
        this.logger.info({ msg: 'Using custom font', tier: 'custom', path: customPath, size });
        return { kind: 'vector', tier: 'custom', family, source: customPath, size };
      }
      this.logger.warn({ msg: 'Custom font not usable, trying system fonts', path: customPath });
    }

    const system = firstSuccess(this.candidates, (candidate) => {
      const family = this.tryLoad(candidate);
      return family ? { family, source: candidate } : null;
    });
    if (system) {
      this.logger.info({ msg: 'Using system font', tier: 'system', path: system.source, size });
      return { kind: 'vector', tier: 'system', family: system.family, source: system.source, size };
    }

    this.logger.warn({
      msg: 'Using built-in bitmap font - text may not display optimally',
      tier: 'builtin',
      font: this.fallbackFont.name,
      requestedSize: size,
    });
    return {
      kind: 'bitmap',
      tier: 'builtin',
      font: this.fallbackFont,
      size: this.fallbackFont.lineHeight,
    };
  }

  private tryLoad(fontPath: string): string | null {
    try {
      return this.fontLoader.load(fontPath);
    } catch (error) {
      this.logger.warn({
        msg: 'Failed to load font',
        path: fontPath,
        error: describeError(error),
      });
      return null;
    }
  }
}
