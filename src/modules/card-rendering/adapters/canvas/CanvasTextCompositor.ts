import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { createCanvas, loadImage, type SKRSContext2D } from '@napi-rs/canvas';
import type { ITextCompositor } from '../../application/ports/ITextCompositor';
import type { RenderResult, RenderSpec, SaveTarget } from '../../application/types/RenderSpec';
import type { FontHandle, FontResolver } from '../../domain/services/FontResolver';
import { placeLines, placeSingleLine, splitLines, type Point } from '../../domain/services/TextLayout';
import { hexToRgb, toCssColor } from '../../domain/value-objects/RgbColor';
import { NotFoundError } from '../../../../domain/errors/NotFoundError';
import type { ILogger } from '../../../../shared/logger';

/**
 * Encoder quality for rendered cards, small enough for an email attachment
 */
export const JPEG_QUALITY = 95;

const BACKGROUND = '#ffffff';

/**
 * Measures and draws text in one resolved font
 */
interface TextPen {
  measure(text: string): number;
  write(text: string, at: Point): void;
}

/**
 * CanvasTextCompositor - ITextCompositor on @napi-rs/canvas
 *
 * **Pipeline:**
 * 1. Decode the template and flatten it onto an opaque white canvas
 *    (transparent or paletted templates end up as plain RGB)
 * 2. Resolve the font and decode the colour
 * 3. Lay out one line, or every line of a multi-line text
 * 4. Encode as JPEG and optionally write it to disk
 */
export class CanvasTextCompositor implements ITextCompositor {
  public constructor(
    private readonly fontResolver: FontResolver,
    private readonly logger: ILogger
  ) {}

  public async render(
    templatePath: string,
    text: string,
    spec: RenderSpec,
    saveTo?: SaveTarget
  ): Promise<RenderResult> {
    if (!existsSync(templatePath)) {
      throw new NotFoundError('template', templatePath);
    }

    const template = await loadImage(await readFile(templatePath));
    const canvas = createCanvas(template.width, template.height);
    const ctx = canvas.getContext('2d');
    ctx.fillStyle = BACKGROUND;
    ctx.fillRect(0, 0, canvas.width, canvas.height);
    ctx.drawImage(template, 0, 0);

    const font = this.fontResolver.resolve(spec.customFontPath, spec.fontSize);
    ctx.fillStyle = toCssColor(hexToRgb(spec.fontColor, this.logger));
    const pen = this.createPen(ctx, font);

    if (spec.multiline) {
      const lines = splitLines(text);
      const origins = placeLines({
        imageWidth: canvas.width,
        imageHeight: canvas.height,
        lineWidths: lines.map((line) => pen.measure(line)),
        fontSize: spec.fontSize,
        position: spec.position,
        centerAlign: spec.centerAlign,
      });
      lines.forEach((line, index) => {
        const origin = origins[index];
        if (origin) {
          pen.write(line, origin);
        }
      });
    } else {
      const origin = placeSingleLine({
        imageWidth: canvas.width,
        textWidth: pen.measure(text),
        position: spec.position,
        centerAlign: spec.centerAlign,
      });
      pen.write(text, origin);
    }

    const imageBytes = await canvas.encode('jpeg', JPEG_QUALITY);

    let savedPath: string | null = null;
    if (saveTo) {
      await mkdir(saveTo.outputDir, { recursive: true });
      savedPath = join(saveTo.outputDir, saveTo.fileName);
      await writeFile(savedPath, imageBytes);
      this.logger.info({ msg: 'Card saved', path: savedPath });
    }

    this.logger.debug({
      msg: 'Card rendered',
      template: templatePath,
      width: canvas.width,
      height: canvas.height,
      fontTier: font.tier,
      bytes: imageBytes.length,
    });

    return { imageBytes, savedPath };
  }

  private createPen(ctx: SKRSContext2D, font: FontHandle): TextPen {
    switch (font.kind) {
      case 'vector':
        ctx.font = `${font.size}px "${font.family}"`;
        ctx.textBaseline = 'top';
        return {
          measure: (text) => ctx.measureText(text).width,
          write: (text, at) => ctx.fillText(text, at.x, at.y),
        };
      case 'bitmap':
        return {
          measure: (text) => font.font.measure(text),
          write: (text, at) => font.font.draw(ctx, text, at.x, at.y),
        };
    }
  }
}
