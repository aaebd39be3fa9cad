/**
 * Compilation Configuration
 *
 * Explicit configuration passed into the pipeline at start.
 * Resolution order: defaults ← environment (.env via dotenv) ← CLI overrides.
 */

import fs from 'fs';
import path from 'path';
import { ConfigurationError } from '../types/errors.js';

export interface CompilationConfig {
  /** Directory holding the spreadsheet and clips; output is written here */
  workDir: string;
  /** Roster spreadsheet (absolute after loading) */
  spreadsheetPath: string;
  /** Final compilation file (absolute after loading) */
  outputPath: string;
  /** How long each title card stays on screen */
  cardDurationSeconds: number;
  /** Bold sans-serif font file used by drawtext */
  fontPath: string;
  /** Output frame width in pixels (even) */
  width: number;
  /** Output frame height in pixels (even) */
  height: number;
  fps: number;
  /** Title-case name, location, composition, raag and taal on the card */
  titleCase: boolean;
}

/**
 * Bold sans-serif fonts probed in order when FONT_PATH is not set
 *
 * Helvetica itself ships as a .ttc collection whose first face is the regular
 * weight, so the macOS entries use Arial Bold.
 */
export const DEFAULT_FONT_CANDIDATES: readonly string[] = [
  '/System/Library/Fonts/Supplemental/Arial Bold.ttf',
  '/Library/Fonts/Arial Bold.ttf',
  '/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf',
  '/usr/share/fonts/dejavu/DejaVuSans-Bold.ttf',
  '/usr/share/fonts/truetype/liberation/LiberationSans-Bold.ttf',
  '/usr/share/fonts/liberation/LiberationSans-Bold.ttf',
  'C:\\Windows\\Fonts\\arialbd.ttf',
];

export const DEFAULT_COMPILATION_CONFIG = {
  spreadsheetPath: 'Performer Data.xlsx',
  outputPath: 'FINAL_VIDEO.mp4',
  cardDurationSeconds: 5,
  width: 1920,
  height: 1080,
  fps: 30,
  titleCase: false,
} as const;

/**
 * First candidate that exists on disk. Falls back to the first candidate so
 * the font preflight reports a concrete path.
 */
export function resolveDefaultFontPath(
  candidates: readonly string[] = DEFAULT_FONT_CANDIDATES,
  exists: (candidate: string) => boolean = fs.existsSync
): string {
  const found = candidates.find(candidate => exists(candidate));
  return found ?? candidates[0] ?? '';
}

function parsePositiveNumber(key: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(key, `expected a positive number, got "${raw}"`);
  }
  return value;
}

function parseEvenDimension(key: string, raw: string | undefined, fallback: number): number {
  const value = parsePositiveNumber(key, raw, fallback);
  // libx264 with yuv420p needs even frame dimensions
  if (!Number.isInteger(value) || value % 2 !== 0) {
    throw new ConfigurationError(key, `expected an even whole number of pixels, got "${raw}"`);
  }
  return value;
}

function parseBoolean(key: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  const normalized = raw.trim().toLowerCase();
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  throw new ConfigurationError(key, `expected true or false, got "${raw}"`);
}

/**
 * Values that may come from the command line, still as text
 */
export interface ConfigOverrides {
  workDir?: string;
  spreadsheetPath?: string;
  outputPath?: string;
  cardDurationSeconds?: string;
  fontPath?: string;
  titleCase?: boolean;
}

/**
 * Build the run configuration from environment variables and CLI overrides
 *
 * @param env - Environment (process.env after dotenv.config())
 * @param overrides - Values from CLI flags; win over the environment
 * @param cwd - Base directory when no working directory is configured
 * @throws ConfigurationError if any value is malformed
 */
export function loadCompilationConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
  cwd: string = process.cwd()
): CompilationConfig {
  const workDir = path.resolve(cwd, overrides.workDir ?? env.COMPILATION_WORKDIR ?? '.');

  const spreadsheet = overrides.spreadsheetPath ?? env.SPREADSHEET_PATH ?? DEFAULT_COMPILATION_CONFIG.spreadsheetPath;
  const output = overrides.outputPath ?? env.OUTPUT_PATH ?? DEFAULT_COMPILATION_CONFIG.outputPath;
  const font = overrides.fontPath ?? env.FONT_PATH ?? resolveDefaultFontPath();

  const config: CompilationConfig = {
    workDir,
    spreadsheetPath: path.resolve(workDir, spreadsheet),
    outputPath: path.resolve(workDir, output),
    cardDurationSeconds: parsePositiveNumber(
      'cardDurationSeconds',
      overrides.cardDurationSeconds ?? env.CARD_DURATION_SECONDS,
      DEFAULT_COMPILATION_CONFIG.cardDurationSeconds
    ),
    fontPath: path.resolve(workDir, font),
    width: parseEvenDimension('width', env.VIDEO_WIDTH, DEFAULT_COMPILATION_CONFIG.width),
    height: parseEvenDimension('height', env.VIDEO_HEIGHT, DEFAULT_COMPILATION_CONFIG.height),
    fps: parsePositiveNumber('fps', env.VIDEO_FPS, DEFAULT_COMPILATION_CONFIG.fps),
    titleCase: overrides.titleCase ?? parseBoolean('titleCase', env.TITLE_CASE, DEFAULT_COMPILATION_CONFIG.titleCase),
  };

  if (config.outputPath === config.spreadsheetPath) {
    throw new ConfigurationError('outputPath', 'must differ from the spreadsheet path');
  }

  return config;
}
