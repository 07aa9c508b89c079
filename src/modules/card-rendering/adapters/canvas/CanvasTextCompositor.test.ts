import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { createCanvas, loadImage } from '@napi-rs/canvas';
import { CanvasTextCompositor } from './CanvasTextCompositor';
import { FontResolver } from '../../domain/services/FontResolver';
import type { IFontLoader } from '../../application/ports/IFontLoader';
import type { RenderSpec } from '../../application/types/RenderSpec';
import { NotFoundError } from '../../../../domain/errors/NotFoundError';
import type { ILogger } from '../../../../shared/logger';

interface Box {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

interface DecodedImage {
  width: number;
  height: number;
  /** Positions of pixels whose red channel is below 128 */
  darkPixels: Array<{ x: number; y: number }>;
}

const decode = async (bytes: Buffer): Promise<DecodedImage> => {
  const image = await loadImage(bytes);
  const canvas = createCanvas(image.width, image.height);
  const ctx = canvas.getContext('2d');
  ctx.drawImage(image, 0, 0);
  const { data } = ctx.getImageData(0, 0, image.width, image.height);

  const darkPixels: Array<{ x: number; y: number }> = [];
  for (let y = 0; y < image.height; y++) {
    for (let x = 0; x < image.width; x++) {
      const red = data[(y * image.width + x) * 4] ?? 255;
      if (red < 128) {
        darkPixels.push({ x, y });
      }
    }
  }
  return { width: image.width, height: image.height, darkPixels };
};

const inside = (point: { x: number; y: number }, box: Box): boolean =>
  point.x >= box.left && point.x <= box.right && point.y >= box.top && point.y <= box.bottom;

describe('CanvasTextCompositor', () => {
  let workDir: string;
  let templatePath: string;
  let mockLogger: jest.Mocked<ILogger>;
  let compositor: CanvasTextCompositor;

  const baseSpec: RenderSpec = {
    position: { x: 0, y: 80 },
    fontSize: 40,
    fontColor: '#000000',
    centerAlign: true,
    multiline: false,
  };

  beforeAll(async () => {
    workDir = mkdtempSync(join(tmpdir(), 'compositor-'));
    const blank = createCanvas(400, 200);
    const ctx = blank.getContext('2d');
    ctx.fillStyle = '#ffffff';
    ctx.fillRect(0, 0, 400, 200);
    templatePath = join(workDir, 'blank.png');
    writeFileSync(templatePath, await blank.encode('png'));
  });

  afterAll(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  beforeEach(() => {
    mockLogger = {
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    };
    const noFonts: IFontLoader = { load: () => null };
    compositor = new CanvasTextCompositor(new FontResolver(noFonts, mockLogger, []), mockLogger);
  });

  it('should draw centered single-line text inside its expected bounding box', async () => {
    // Act
    const result = await compositor.render(templatePath, 'HI', baseSpec);
    const decoded = await decode(result.imageBytes);

    // Assert
    // "HI" in the built-in font is 22x14: x = floor((400 - 22) / 2) = 189
    const textBox: Box = { left: 189, top: 80, right: 210, bottom: 93 };
    const margin: Box = { left: 185, top: 76, right: 214, bottom: 97 };
    expect(decoded.width).toBe(400);
    expect(decoded.height).toBe(200);
    expect(decoded.darkPixels.filter((p) => inside(p, textBox)).length).toBeGreaterThan(50);
    expect(decoded.darkPixels.filter((p) => !inside(p, margin))).toEqual([]);
    expect(result.savedPath).toBeNull();
  });

  it('should draw at the given position when not centered', async () => {
    // Act
    const result = await compositor.render(templatePath, 'HI', {
      ...baseSpec,
      position: { x: 10, y: 20 },
      centerAlign: false,
    });
    const decoded = await decode(result.imageBytes);

    // Assert
    const textBox: Box = { left: 10, top: 20, right: 31, bottom: 33 };
    const margin: Box = { left: 6, top: 16, right: 35, bottom: 37 };
    expect(decoded.darkPixels.filter((p) => inside(p, textBox)).length).toBeGreaterThan(50);
    expect(decoded.darkPixels.filter((p) => !inside(p, margin))).toEqual([]);
  });

  it('should center every line of multi-line text vertically and horizontally', async () => {
    // Act
    const result = await compositor.render(templatePath, 'A\nB', {
      ...baseSpec,
      position: { x: 0, y: 0 },
      multiline: true,
    });
    const decoded = await decode(result.imageBytes);

    // Assert
    // line height is the requested size 40 + 10, block 100 tall: startY = (200 - 100) / 2 = 50
    // each glyph 10 wide: x = floor((400 - 10) / 2) = 195
    const firstLine: Box = { left: 195, top: 50, right: 204, bottom: 63 };
    const secondLine: Box = { left: 195, top: 100, right: 204, bottom: 113 };
    const margin: Box = { left: 191, top: 46, right: 208, bottom: 117 };
    expect(decoded.darkPixels.filter((p) => inside(p, firstLine)).length).toBeGreaterThan(20);
    expect(decoded.darkPixels.filter((p) => inside(p, secondLine)).length).toBeGreaterThan(20);
    expect(decoded.darkPixels.filter((p) => !inside(p, margin))).toEqual([]);
  });

  it('should draw multi-line text from the given position when not centered', async () => {
    // Act
    const result = await compositor.render(templatePath, 'A\nB', {
      ...baseSpec,
      position: { x: 10, y: 20 },
      centerAlign: false,
      multiline: true,
    });
    const decoded = await decode(result.imageBytes);

    // Assert
    // lines at y = 20 and y = 20 + 50, both starting at x = 10
    const firstLine: Box = { left: 10, top: 20, right: 19, bottom: 33 };
    const secondLine: Box = { left: 10, top: 70, right: 19, bottom: 83 };
    const margin: Box = { left: 6, top: 16, right: 23, bottom: 87 };
    expect(decoded.darkPixels.filter((p) => inside(p, firstLine)).length).toBeGreaterThan(20);
    expect(decoded.darkPixels.filter((p) => inside(p, secondLine)).length).toBeGreaterThan(20);
    expect(decoded.darkPixels.filter((p) => !inside(p, margin))).toEqual([]);
  });

  it('should fall back to black for an invalid colour and warn', async () => {
    // Act
    const result = await compositor.render(templatePath, 'HI', { ...baseSpec, fontColor: 'bad' });
    const decoded = await decode(result.imageBytes);

    // Assert
    expect(decoded.darkPixels.length).toBeGreaterThan(50);
    expect(mockLogger.warn).toHaveBeenCalledWith({
      msg: 'Invalid hex colour, using black as default',
      color: 'bad',
    });
  });

  it('should encode the card as JPEG and save it when asked', async () => {
    // Arrange
    const outputDir = join(workDir, 'output', 'nested');

    // Act
    const result = await compositor.render(templatePath, 'HI', baseSpec, {
      outputDir,
      fileName: 'birthday_Jane_Smith_20240101.jpg',
    });

    // Assert
    const expectedPath = join(outputDir, 'birthday_Jane_Smith_20240101.jpg');
    expect(result.savedPath).toBe(expectedPath);
    expect(existsSync(expectedPath)).toBe(true);
    expect(readFileSync(expectedPath).equals(result.imageBytes)).toBe(true);
    expect(result.imageBytes[0]).toBe(0xff);
    expect(result.imageBytes[1]).toBe(0xd8);
  });

  it('should throw NotFoundError for a missing template', async () => {
    // Arrange
    const missing = join(workDir, 'missing.png');

    // Act & Assert
    await expect(compositor.render(missing, 'HI', baseSpec)).rejects.toThrow(NotFoundError);
    await expect(compositor.render(missing, 'HI', baseSpec)).rejects.toThrow(
      `Template image not found: ${missing}`
    );
  });
});
