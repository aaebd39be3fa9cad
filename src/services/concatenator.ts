/**
 * Concatenator Service
 * Joins title card / clip pairs, in roster order, into the final video.
 *
 * Performer clips arrive in whatever resolution, frame rate and audio layout
 * the performer recorded; each is re-encoded to the title card format first
 * so the concat demuxer can stream-copy every segment.
 */

import ffmpeg from 'fluent-ffmpeg';
import { promises as fs } from 'fs';
import path from 'path';
import type { CompilationConfig } from '../config/compilation.js';
import type { CompilationPair, FinalVideo } from '../types/compilation.js';
import { CompilationError, ConcatenationError, toPerformerContext } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import {
  DETERMINISTIC_OUTPUT_OPTIONS,
  SILENT_AUDIO_SOURCE,
  probeMedia,
  runFfmpeg,
  segmentEncodeOptions,
} from './ffmpeg.js';

export type NormalizeOptions = Pick<CompilationConfig, 'width' | 'height' | 'fps'>;

/**
 * Scale to fit inside the frame, pad the rest black (portrait clips become
 * pillarboxed landscape), square pixels, constant frame rate.
 */
export function buildNormalizeFilter(options: NormalizeOptions): string {
  const { width, height, fps } = options;
  return [
    `scale=${width}:${height}:force_original_aspect_ratio=decrease`,
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:color=black`,
    'setsar=1',
    `fps=${fps}`,
    'format=yuv420p',
  ].join(',');
}

/**
 * Concat demuxer list: one `file '<path>'` line per segment
 */
export function buildConcatList(segmentPaths: readonly string[]): string {
  return segmentPaths
    .map(segmentPath => `file '${segmentPath.replace(/'/g, `'\\''`)}'`)
    .join('\n') + '\n';
}

/**
 * Re-encode a performer clip to the shared segment format
 *
 * Clips without an audio stream get a silent track so every segment has the
 * same stream layout.
 */
export async function normalizeClip(
  inputPath: string,
  outputPath: string,
  config: NormalizeOptions
): Promise<void> {
  const media = await probeMedia(inputPath);
  logger.info(
    `[Concatenator] 🔄 Normalizing ${path.basename(inputPath)} ` +
    `(${media.width}x${media.height} → ${config.width}x${config.height}${media.hasAudio ? '' : ', adding silent audio'})`
  );

  let command = ffmpeg().input(inputPath);
  const mapOptions = ['-map', '0:v:0'];

  if (media.hasAudio) {
    mapOptions.push('-map', '0:a:0');
  } else {
    command = command.input(SILENT_AUDIO_SOURCE).inputFormat('lavfi');
    mapOptions.push('-map', '1:a:0', '-shortest');
  }

  command = command
    .videoFilters(buildNormalizeFilter(config))
    .outputOptions([...mapOptions, ...segmentEncodeOptions(config)])
    .output(outputPath);

  await runFfmpeg(command, `normalize ${path.basename(inputPath)}`);
}

/**
 * Build the final video from ordered title card / clip pairs
 *
 * Output is written to "<output>.partial" beside the final file and renamed
 * over it only after FFmpeg succeeds, so a failed run never leaves a partial
 * or half-overwritten output.
 *
 * @param pairs - Pairs in roster order
 * @param outputPath - Final video path
 * @param workspaceDir - Run workspace for normalized clips and the list file
 * @param config - Output format
 * @throws ConcatenationError if any segment cannot be read or assembled
 */
export async function concatenateSegments(
  pairs: readonly CompilationPair[],
  outputPath: string,
  workspaceDir: string,
  config: NormalizeOptions
): Promise<FinalVideo> {
  if (pairs.length === 0) {
    throw new ConcatenationError('no segments to concatenate');
  }

  const normalizedDir = path.join(workspaceDir, 'normalized');
  await fs.mkdir(normalizedDir, { recursive: true });

  const segmentPaths: string[] = [];
  for (const [index, pair] of pairs.entries()) {
    const { clip, record } = pair.performer;
    const normalizedPath = path.join(normalizedDir, `clip-${String(index + 1).padStart(4, '0')}.mp4`);

    try {
      await normalizeClip(clip.path, normalizedPath, config);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConcatenationError(`could not normalize ${clip.filename}: ${message}`, {
        segmentPath: clip.path,
        performer: toPerformerContext(record),
        cause: error,
      });
    }

    segmentPaths.push(pair.titleCard.path, normalizedPath);
  }

  const listPath = path.join(workspaceDir, 'segments.txt');
  const partialPath = `${outputPath}.partial`;

  logger.info(`[Concatenator] 🎬 Stitching ${segmentPaths.length} segments into ${path.basename(outputPath)}`);

  try {
    await fs.writeFile(listPath, buildConcatList(segmentPaths), 'utf-8');

    const command = ffmpeg()
      .input(listPath)
      .inputOptions(['-f', 'concat', '-safe', '0'])
      .outputOptions([
        '-map', '0',
        '-c', 'copy',
        '-movflags', '+faststart',
        ...DETERMINISTIC_OUTPUT_OPTIONS,
      ])
      .format('mp4')
      .output(partialPath);

    await runFfmpeg(command, 'concatenate segments');
    await fs.rename(partialPath, outputPath);
  } catch (error) {
    await fs.rm(partialPath, { force: true });
    if (error instanceof CompilationError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new ConcatenationError(message, { cause: error });
  }

  logger.info(`[Concatenator] ✅ Final video is ready: ${outputPath}`);
  return { path: outputPath, segmentCount: segmentPaths.length };
}
