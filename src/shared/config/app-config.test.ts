import { loadAppConfig } from './app-config';
import { ConfigError } from '../../domain/errors/ConfigError';

const captureError = (action: () => unknown): unknown => {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
};

describe('loadAppConfig', () => {
  const requiredEnv = {
    BIRTHDAY_CARD: 'templates/birthday.png',
    ANNIVERSARY_CARD: 'templates/anniversary.png',
  };

  it('should apply defaults for every optional setting', () => {
    // Act
    const config = loadAppConfig(requiredEnv);

    // Assert
    expect(config).toEqual({
      employeeFile: 'employees.csv',
      outputDir: 'output',
      cards: {
        birthday: {
          templatePath: 'templates/birthday.png',
          position: { x: 50, y: 300 },
          fontSize: 64,
          fontColor: '#4b446a',
          customFontPath: undefined,
          centerAlign: false,
        },
        anniversary: {
          templatePath: 'templates/anniversary.png',
          position: { x: 0, y: 200 },
          fontSize: 72,
          fontColor: '#72719f',
          customFontPath: undefined,
          centerAlign: true,
        },
      },
      timezone: undefined,
      logLevel: 'info',
      nodeEnv: 'development',
    });
  });

  it('should coerce numbers and flags from strings', () => {
    // Act
    const config = loadAppConfig({
      ...requiredEnv,
      BIRTHDAY_TEXT_X: '120',
      BIRTHDAY_TEXT_Y: '0',
      BIRTHDAY_FONT_SIZE: '48',
      BIRTHDAY_CENTER_ALIGN: 'TRUE',
      ANNIVERSARY_CENTER_ALIGN: 'false',
      ANNIVERSARY_FONT_PATH: 'fonts/script.ttf',
      CELEBRATION_TIMEZONE: 'Asia/Kolkata',
    });

    // Assert
    expect(config.cards.birthday.position).toEqual({ x: 120, y: 0 });
    expect(config.cards.birthday.fontSize).toBe(48);
    expect(config.cards.birthday.centerAlign).toBe(true);
    expect(config.cards.anniversary.centerAlign).toBe(false);
    expect(config.cards.anniversary.customFontPath).toBe('fonts/script.ttf');
    expect(config.timezone).toBe('Asia/Kolkata');
  });

  it('should treat blank values as unset', () => {
    // Act
    const config = loadAppConfig({ ...requiredEnv, CSV_FILE: '  ', BIRTHDAY_FONT_PATH: '' });

    // Assert
    expect(config.employeeFile).toBe('employees.csv');
    expect(config.cards.birthday.customFontPath).toBeUndefined();
  });

  it('should list every missing template path', () => {
    // Act
    const error = captureError(() => loadAppConfig({ ANNIVERSARY_CARD: '' }));

    // Assert
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      issues: ['BIRTHDAY_CARD: Required', 'ANNIVERSARY_CARD: Required'],
      message: 'Invalid configuration: BIRTHDAY_CARD: Required; ANNIVERSARY_CARD: Required',
    });
  });

  it('should reject malformed numbers, flags and zones', () => {
    // Act
    const error = captureError(() =>
      loadAppConfig({
        ...requiredEnv,
        BIRTHDAY_FONT_SIZE: 'large',
        ANNIVERSARY_CENTER_ALIGN: 'yes',
        CELEBRATION_TIMEZONE: 'Mars/Olympus_Mons',
      })
    );

    // Assert
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({
      issues: [
        'BIRTHDAY_FONT_SIZE: Expected number, received nan',
        "ANNIVERSARY_CENTER_ALIGN: Invalid enum value. Expected 'true' | 'false', received 'yes'",
        'CELEBRATION_TIMEZONE: must be a valid IANA time zone',
      ],
    });
  });
});
