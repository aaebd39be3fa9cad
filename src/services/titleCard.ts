/**
 * Title Card Renderer Service
 * Renders one still card per performer (white bold sans text on black) and
 * turns it into a fixed-duration, silent video segment.
 *
 * Layout is defined on a 1920x1080 reference frame and scaled to the
 * configured resolution; every line is centred horizontally.
 */

import ffmpeg from 'fluent-ffmpeg';
import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import type { CompilationConfig } from '../config/compilation.js';
import type { PerformerRecord, TitleCardImage, TitleCardSegment } from '../types/compilation.js';
import { CompilationError, FontUnavailableError, RenderError, toPerformerContext } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import {
  DETERMINISTIC_OUTPUT_OPTIONS,
  SILENT_AUDIO_SOURCE,
  escapeFilterOptionValue,
  runFfmpeg,
  segmentEncodeOptions,
} from './ffmpeg.js';

export type TitleCardField = 'name' | 'location' | 'description' | 'composition' | 'raag' | 'taal';

export interface TitleCardLine {
  field: TitleCardField;
  text: string;
  /** Font size in pixels at the output resolution */
  fontSize: number;
  /** Top of the line in pixels at the output resolution */
  y: number;
}

export interface TitleCardLayout {
  width: number;
  height: number;
  lines: TitleCardLine[];
  warnings: string[];
}

export type TitleCardLayoutOptions = Pick<CompilationConfig, 'width' | 'height' | 'titleCase'>;

const REFERENCE_HEIGHT = 1080;

/**
 * Reference positions (y at 1080p) and font sizes, top to bottom
 */
const LAYOUT = {
  name:        { y: REFERENCE_HEIGHT / 6,      fontSize: 85 },
  location:    { y: REFERENCE_HEIGHT / 6 + 90, fontSize: 60 },
  description: { y: REFERENCE_HEIGHT / 3 + 40, fontSize: 45, lineSpacing: 60 },
  composition: { y: REFERENCE_HEIGHT / 2 + 80, fontSize: 80 },
  raag:        { y: REFERENCE_HEIGHT / 2 + 190, fontSize: 70 },
  taal:        { y: REFERENCE_HEIGHT / 2 + 280, fontSize: 60 },
} as const;

export const DESCRIPTION_WORDS_PER_LINE = 9;

/** Description lines that fit above the composition line */
export const DESCRIPTION_MAX_LINES = 4;

/** Usable text width as a share of the frame width */
const MAX_TEXT_WIDTH_RATIO = 0.9;

/** Smallest font a line may shrink to, as a share of its reference size */
const MIN_FONT_SCALE = 0.6;

/** Average advance of a bold sans glyph relative to the font size */
const GLYPH_WIDTH_RATIO = 0.6;

const ELLIPSIS = '…';

/**
 * Known TrueType / OpenType / collection file signatures
 */
const FONT_SIGNATURES = [
  Buffer.from([0x00, 0x01, 0x00, 0x00]),
  Buffer.from('OTTO', 'latin1'),
  Buffer.from('true', 'latin1'),
  Buffer.from('ttcf', 'latin1'),
];

/**
 * Fail fast if the configured font cannot be loaded by drawtext
 *
 * @throws FontUnavailableError if the file is missing, unreadable or not a font
 */
export async function assertFontAvailable(fontPath: string): Promise<void> {
  let handle: FileHandle;
  try {
    handle = await fs.open(fontPath, 'r');
  } catch (error) {
    throw new FontUnavailableError(fontPath, 'file not found or not readable', error);
  }

  try {
    const header = Buffer.alloc(4);
    const { bytesRead } = await handle.read(header, 0, 4, 0);
    const isFont = bytesRead === 4 && FONT_SIGNATURES.some(signature => signature.equals(header));
    if (!isFont) {
      throw new FontUnavailableError(fontPath, 'not a TrueType or OpenType font file');
    }
  } finally {
    await handle.close();
  }

  logger.info(`[TitleCard] 🔤 Using font ${fontPath}`);
}

export function toTitleCase(value: string): string {
  return value.replace(/\S+/g, word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

function estimateTextWidth(text: string, fontSize: number): number {
  return [...text].length * fontSize * GLYPH_WIDTH_RATIO;
}

/**
 * Shrink a line's font until it fits the frame; truncate with an ellipsis
 * if it still does not fit at the minimum size.
 */
function fitLine(
  text: string,
  referenceSize: number,
  scale: number,
  maxWidth: number
): { text: string; fontSize: number; truncated: boolean } {
  const baseSize = Math.round(referenceSize * scale);
  if (estimateTextWidth(text, baseSize) <= maxWidth) {
    return { text, fontSize: baseSize, truncated: false };
  }

  const minSize = Math.round(baseSize * MIN_FONT_SCALE);
  const characters = [...text];
  const fittingSize = Math.floor(maxWidth / (characters.length * GLYPH_WIDTH_RATIO));
  const fontSize = Math.max(minSize, Math.min(baseSize, fittingSize));
  if (estimateTextWidth(text, fontSize) <= maxWidth) {
    return { text, fontSize, truncated: false };
  }

  const maxCharacters = Math.floor(maxWidth / (fontSize * GLYPH_WIDTH_RATIO));
  const truncated = characters.slice(0, Math.max(0, maxCharacters - 1)).join('').trimEnd() + ELLIPSIS;
  return { text: truncated, fontSize, truncated: true };
}

/**
 * Split a description into lines of DESCRIPTION_WORDS_PER_LINE words
 */
export function wrapDescription(description: string): { lines: string[]; truncated: boolean } {
  const words = description.split(/\s+/).filter(word => word.length > 0);
  const lines: string[] = [];
  for (let i = 0; i < words.length; i += DESCRIPTION_WORDS_PER_LINE) {
    lines.push(words.slice(i, i + DESCRIPTION_WORDS_PER_LINE).join(' '));
  }

  if (lines.length <= DESCRIPTION_MAX_LINES) {
    return { lines, truncated: false };
  }

  const kept = lines.slice(0, DESCRIPTION_MAX_LINES);
  kept[kept.length - 1] = `${kept[kept.length - 1]} ${ELLIPSIS}`;
  return { lines: kept, truncated: true };
}

/**
 * Compute the text lines of a performer's card
 *
 * Empty fields produce no line at all, so the card shows blank space rather
 * than a placeholder or an empty label.
 */
export function buildTitleCardLayout(record: PerformerRecord, options: TitleCardLayoutOptions): TitleCardLayout {
  const scale = options.height / REFERENCE_HEIGHT;
  const maxWidth = options.width * MAX_TEXT_WIDTH_RATIO;
  const format = (value: string): string => (options.titleCase ? toTitleCase(value) : value);

  const lines: TitleCardLine[] = [];
  const warnings: string[] = [];

  const addLine = (field: TitleCardField, text: string, referenceY: number, referenceSize: number): void => {
    const fitted = fitLine(text, referenceSize, scale, maxWidth);
    if (fitted.truncated) {
      warnings.push(`Title card ${field} for ${record.name} (row ${record.rowNumber}) was truncated to fit the frame`);
    }
    lines.push({ field, text: fitted.text, fontSize: fitted.fontSize, y: Math.round(referenceY * scale) });
  };

  if (record.name) {
    addLine('name', format(record.name), LAYOUT.name.y, LAYOUT.name.fontSize);
  }
  if (record.location) {
    addLine('location', `(${format(record.location)})`, LAYOUT.location.y, LAYOUT.location.fontSize);
  }

  const description = wrapDescription(record.description);
  if (description.truncated) {
    warnings.push(
      `Title card description for ${record.name} (row ${record.rowNumber}) exceeds ` +
      `${DESCRIPTION_MAX_LINES} lines and was truncated`
    );
  }
  description.lines.forEach((line, index) => {
    const y = LAYOUT.description.y + index * LAYOUT.description.lineSpacing;
    addLine('description', line, y, LAYOUT.description.fontSize);
  });

  if (record.composition) {
    addLine('composition', format(record.composition), LAYOUT.composition.y, LAYOUT.composition.fontSize);
  }
  if (record.raag) {
    addLine('raag', `Raag ${format(record.raag)}`, LAYOUT.raag.y, LAYOUT.raag.fontSize);
  }
  if (record.taal) {
    addLine('taal', `(${format(record.taal)})`, LAYOUT.taal.y, LAYOUT.taal.fontSize);
  }

  return { width: options.width, height: options.height, lines, warnings };
}

/**
 * drawtext filter for one line whose text lives in textFile
 *
 * textfile + expansion=none keeps spreadsheet text literal; only the font
 * and text file paths pass through filtergraph escaping.
 */
export function buildDrawtextFilter(line: TitleCardLine, textFile: string, fontPath: string): string {
  return [
    `drawtext=fontfile=${escapeFilterOptionValue(fontPath)}`,
    `textfile=${escapeFilterOptionValue(textFile)}`,
    'expansion=none',
    'fontcolor=white',
    `fontsize=${line.fontSize}`,
    'x=(w-text_w)/2',
    `y=${line.y}`,
  ].join(':');
}

function cardDirectory(record: PerformerRecord, workspaceDir: string): string {
  return path.join(workspaceDir, `card-row${String(record.rowNumber).padStart(4, '0')}`);
}

/**
 * Render the still title card image (PNG) for one performer
 *
 * @throws RenderError if writing the text files or encoding the image fails
 */
export async function renderTitleCardImage(
  record: PerformerRecord,
  workspaceDir: string,
  config: CompilationConfig
): Promise<TitleCardImage> {
  const performer = toPerformerContext(record);
  const layout = buildTitleCardLayout(record, config);
  const outputDir = cardDirectory(record, workspaceDir);
  const imagePath = path.join(outputDir, 'title-card.png');
  const log = logger.child({ performer: record.name, rowNumber: record.rowNumber });

  log.info('[TitleCard] 🎨 Creating title card', { lines: layout.lines.length });

  try {
    await fs.mkdir(outputDir, { recursive: true });

    const filters: string[] = [];
    for (const [index, line] of layout.lines.entries()) {
      const textFile = path.join(outputDir, `line-${String(index + 1).padStart(2, '0')}.txt`);
      await fs.writeFile(textFile, line.text, 'utf-8');
      filters.push(buildDrawtextFilter(line, textFile, config.fontPath));
    }

    let command = ffmpeg()
      .input(`color=c=black:s=${layout.width}x${layout.height}:r=1`)
      .inputFormat('lavfi');

    if (filters.length > 0) {
      command = command.videoFilters(filters);
    }

    command = command
      .outputOptions(['-frames:v', '1', ...DETERMINISTIC_OUTPUT_OPTIONS])
      .output(imagePath);

    await runFfmpeg(command, `title card image (row ${record.rowNumber})`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RenderError(performer, message, error);
  }

  return { record, imagePath, warnings: layout.warnings };
}

/**
 * Loop a title card image into a silent segment of cardDurationSeconds
 *
 * @throws RenderError if encoding fails
 */
export async function renderTitleCardSegment(
  image: TitleCardImage,
  workspaceDir: string,
  config: CompilationConfig
): Promise<TitleCardSegment> {
  const { record } = image;
  const segmentPath = path.join(cardDirectory(record, workspaceDir), 'title-card.mp4');

  const command = ffmpeg()
    .input(image.imagePath)
    .inputOptions(['-loop', '1', '-framerate', String(config.fps)])
    .input(SILENT_AUDIO_SOURCE)
    .inputFormat('lavfi')
    .outputOptions([
      '-map', '0:v:0',
      '-map', '1:a:0',
      '-t', String(config.cardDurationSeconds),
      ...segmentEncodeOptions(config),
    ])
    .output(segmentPath);

  try {
    await runFfmpeg(command, `title card segment (row ${record.rowNumber})`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RenderError(toPerformerContext(record), message, error);
  }

  logger
    .child({ performer: record.name, rowNumber: record.rowNumber })
    .info(`[TitleCard] ✓ Title card ready (${config.cardDurationSeconds}s)`);
  return {
    record,
    path: segmentPath,
    durationSeconds: config.cardDurationSeconds,
    warnings: image.warnings,
  };
}

/**
 * Render a performer's complete title card segment
 */
export async function renderTitleCard(
  record: PerformerRecord,
  workspaceDir: string,
  config: CompilationConfig
): Promise<TitleCardSegment> {
  try {
    const image = await renderTitleCardImage(record, workspaceDir, config);
    return await renderTitleCardSegment(image, workspaceDir, config);
  } catch (error) {
    if (error instanceof CompilationError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new RenderError(toPerformerContext(record), message, error);
  }
}
