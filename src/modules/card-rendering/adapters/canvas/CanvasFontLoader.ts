import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import { GlobalFonts } from '@napi-rs/canvas';
import type { IFontLoader } from '../../application/ports/IFontLoader';

export type FontRegistry = Pick<typeof GlobalFonts, 'registerFromPath'>;

const FAMILY_PREFIX = 'celebration-font';

/**
 * CanvasFontLoader - IFontLoader backed by @napi-rs/canvas GlobalFonts
 *
 * Each font file is registered once under a generated family alias; later
 * loads of the same file reuse the alias.
 */
export class CanvasFontLoader implements IFontLoader {
  private readonly families = new Map<string, string>();

  public constructor(private readonly registry: FontRegistry = GlobalFonts) {}

  public load(fontPath: string): string | null {
    const absolutePath = resolve(fontPath);

    const known = this.families.get(absolutePath);
    if (known) {
      return known;
    }

    if (!existsSync(absolutePath) || !statSync(absolutePath).isFile()) {
      return null;
    }

    const family = `${FAMILY_PREFIX}-${this.families.size + 1}`;
    if (!this.registry.registerFromPath(absolutePath, family)) {
      return null;
    }

    this.families.set(absolutePath, family);
    return family;
  }
}
