/**
 * Unit tests for the command-line entry point
 */

import { describe, it, expect, jest, afterEach } from '@jest/globals';
import { main, parseCliArgs } from '../index.js';

describe('parseCliArgs()', () => {
  it('should return no overrides without flags', () => {
    expect(parseCliArgs([])).toEqual({ help: false, overrides: {} });
  });

  it('should map value flags to configuration overrides', () => {
    const options = parseCliArgs([
      '--workdir', '/shows/2024',
      '--spreadsheet', 'roster.xlsx',
      '--output', 'out.mp4',
      '--duration', '7',
      '--font', '/fonts/placeholder-bold.ttf',
      '--title-case',
    ]);

    expect(options).toEqual({
      help: false,
      overrides: {
        workDir: '/shows/2024',
        spreadsheetPath: 'roster.xlsx',
        outputPath: 'out.mp4',
        cardDurationSeconds: '7',
        fontPath: '/fonts/placeholder-bold.ttf',
        titleCase: true,
      },
    });
  });

  it('should recognise help flags', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
    expect(parseCliArgs(['--help']).help).toBe(true);
  });

  it('should reject unknown flags', () => {
    expect(() => parseCliArgs(['--verbose'])).toThrow('Unknown option: --verbose');
  });

  it('should reject a value flag without a value', () => {
    expect(() => parseCliArgs(['--output'])).toThrow('Missing value for --output');
    expect(() => parseCliArgs(['--output', '--title-case'])).toThrow('Missing value for --output');
  });
});

describe('main()', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should print usage and succeed for --help', async () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    await expect(main(['--help'])).resolves.toBe(0);
    expect(String(log.mock.calls[0]?.[0])).toMatch(/^Usage: performer-compilation/);
  });

  it('should report a bad flag and exit with status 1', async () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(main(['--bogus'])).resolves.toBe(1);
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain('"message":"Unknown option: --bogus"');
  });
});
