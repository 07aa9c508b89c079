import { LINE_GUTTER, placeLines, placeSingleLine, splitLines } from './TextLayout';

describe('TextLayout', () => {
  describe('splitLines', () => {
    it('should split on the line-break marker', () => {
      expect(splitLines('Happy Anniversary\nJane')).toEqual(['Happy Anniversary', 'Jane']);
    });

    it('should accept CRLF breaks', () => {
      expect(splitLines('one\r\ntwo')).toEqual(['one', 'two']);
    });

    it('should return a single line when there is no break', () => {
      expect(splitLines('Happy Birthday Jane')).toEqual(['Happy Birthday Jane']);
    });
  });

  describe('placeSingleLine', () => {
    it('should use the position verbatim when not centered', () => {
      const point = placeSingleLine({
        imageWidth: 1280,
        textWidth: 300,
        position: { x: 50, y: 300 },
        centerAlign: false,
      });

      expect(point).toEqual({ x: 50, y: 300 });
    });

    it('should center horizontally and keep the requested y', () => {
      const point = placeSingleLine({
        imageWidth: 1280,
        textWidth: 300,
        position: { x: 50, y: 300 },
        centerAlign: true,
      });

      expect(point).toEqual({ x: 490, y: 300 });
    });

    it('should round the centered x down', () => {
      const point = placeSingleLine({
        imageWidth: 101,
        textWidth: 20,
        position: { x: 0, y: 10 },
        centerAlign: true,
      });

      expect(point.x).toBe(40);
    });

    it('should allow a negative x when the text is wider than the image', () => {
      const point = placeSingleLine({
        imageWidth: 100,
        textWidth: 150,
        position: { x: 0, y: 0 },
        centerAlign: true,
      });

      expect(point.x).toBe(-25);
    });
  });

  describe('placeLines', () => {
    it('should use fontSize plus the gutter as line height', () => {
      expect(LINE_GUTTER).toBe(10);

      const points = placeLines({
        imageWidth: 1280,
        imageHeight: 720,
        lineWidths: [400, 100],
        fontSize: 72,
        position: { x: 0, y: 200 },
        centerAlign: true,
      });

      expect(points).toEqual([
        { x: 440, y: 200 },
        { x: 590, y: 282 },
      ]);
    });

    it('should center the block vertically when y is zero', () => {
      // Arrange - two lines of 50px text: height 2 * 60 = 120, start (400 - 120) / 2
      const input = {
        imageWidth: 800,
        imageHeight: 400,
        lineWidths: [200, 300],
        fontSize: 50,
        position: { x: 0, y: 0 },
        centerAlign: true,
      };

      // Act
      const points = placeLines(input);

      // Assert
      expect(points).toEqual([
        { x: 300, y: 140 },
        { x: 250, y: 200 },
      ]);
    });

    it('should center the block vertically when y is negative', () => {
      const points = placeLines({
        imageWidth: 100,
        imageHeight: 101,
        lineWidths: [10],
        fontSize: 20,
        position: { x: 0, y: -5 },
        centerAlign: true,
      });

      expect(points).toEqual([{ x: 45, y: 35 }]);
    });

    it('should ignore position.x when centered', () => {
      const points = placeLines({
        imageWidth: 100,
        imageHeight: 100,
        lineWidths: [20],
        fontSize: 10,
        position: { x: 999, y: 5 },
        centerAlign: true,
      });

      expect(points).toEqual([{ x: 40, y: 5 }]);
    });

    it('should stack lines from the given position when not centered', () => {
      const points = placeLines({
        imageWidth: 800,
        imageHeight: 400,
        lineWidths: [200, 300],
        fontSize: 40,
        position: { x: 10, y: 20 },
        centerAlign: false,
      });

      expect(points).toEqual([
        { x: 10, y: 20 },
        { x: 10, y: 70 },
      ]);
    });

    it('should not center vertically when not centered and y is zero', () => {
      const points = placeLines({
        imageWidth: 800,
        imageHeight: 400,
        lineWidths: [200],
        fontSize: 40,
        position: { x: 0, y: 0 },
        centerAlign: false,
      });

      expect(points).toEqual([{ x: 0, y: 0 }]);
    });
  });
});
