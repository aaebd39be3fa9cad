/**
 * FFmpeg Service
 * Shared helpers for running fluent-ffmpeg commands, probing media and
 * keeping every encoded segment in one concat-compatible format.
 */

import ffmpeg from 'fluent-ffmpeg';
import type { FfmpegCommand } from 'fluent-ffmpeg';
import type { CompilationConfig } from '../config/compilation.js';
import { logger } from '../utils/logger.js';

/** Audio format shared by title cards and normalized clips */
export const AUDIO_SAMPLE_RATE = 48000;
export const AUDIO_CHANNELS = 2;

/** Track timescale shared by every segment so concat timestamps line up */
const VIDEO_TRACK_TIMESCALE = 90000;

/**
 * Basic stream information for a media file
 */
export interface MediaInfo {
  width: number;
  height: number;
  /** Duration in seconds (0 when the container does not report one) */
  duration: number;
  hasAudio: boolean;
}

/**
 * Silent stereo audio for the lavfi input format
 */
export const SILENT_AUDIO_SOURCE =
  `anullsrc=channel_layout=stereo:sample_rate=${AUDIO_SAMPLE_RATE}`;

/**
 * Strip container metadata and encoder version strings so identical inputs
 * produce identical files
 */
export const DETERMINISTIC_OUTPUT_OPTIONS: readonly string[] = [
  '-map_metadata', '-1',
  '-fflags', '+bitexact',
  '-flags:v', '+bitexact',
  '-flags:a', '+bitexact',
];

/**
 * Output options for one concat-compatible segment:
 * H.264 yuv420p at the configured fps, AAC 48kHz stereo
 */
export function segmentEncodeOptions(config: Pick<CompilationConfig, 'fps'>): string[] {
  return [
    '-c:v', 'libx264',
    '-preset', 'medium',
    '-crf', '18',
    '-pix_fmt', 'yuv420p',
    '-r', String(config.fps),
    '-c:a', 'aac',
    '-b:a', '192k',
    '-ar', String(AUDIO_SAMPLE_RATE),
    '-ac', String(AUDIO_CHANNELS),
    '-video_track_timescale', String(VIDEO_TRACK_TIMESCALE),
    ...DETERMINISTIC_OUTPUT_OPTIONS,
  ];
}

/**
 * Escape a value for a filter option inside a filtergraph
 *
 * Two levels: the filter's own option parser (':' separates options) and
 * the filtergraph parser ('[', ']', ',' and ';' separate filters). Each level
 * consumes one layer of backslashes.
 */
export function escapeFilterOptionValue(value: string): string {
  const optionLevel = value.replace(/[\\':]/g, '\\$&');
  return optionLevel.replace(/[\\'[\],;]/g, '\\$&');
}

/**
 * Last lines of FFmpeg stderr, enough to show why a command failed
 */
function tailLines(text: string, count: number = 5): string {
  return text.trim().split('\n').slice(-count).join('\n');
}

/**
 * Run a prepared command to completion
 *
 * @param command - Fully configured fluent-ffmpeg command
 * @param label - Operation name used in logs and errors
 */
export function runFfmpeg(command: FfmpegCommand, label: string): Promise<void> {
  return new Promise((resolve, reject) => {
    command
      .on('start', (commandLine: string) => {
        logger.debug(`[FFmpeg] ▶️  ${label}`, { commandLine });
      })
      .on('end', () => resolve())
      .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
        const details = stderr ? `\n${tailLines(stderr)}` : '';
        reject(new Error(`FFmpeg ${label} failed: ${err.message}${details}`));
      })
      .run();
  });
}

/**
 * Probe a media file for its first video stream and audio presence
 *
 * @throws Error if the file cannot be probed or has no video stream
 */
export function probeMedia(filePath: string): Promise<MediaInfo> {
  return new Promise((resolve, reject) => {
    ffmpeg.ffprobe(filePath, (err, metadata) => {
      if (err) {
        reject(err instanceof Error ? err : new Error(String(err)));
        return;
      }

      const videoStream = metadata.streams.find(s => s.codec_type === 'video');
      if (!videoStream || !videoStream.width || !videoStream.height) {
        reject(new Error(`Could not extract video dimensions from ${filePath}`));
        return;
      }

      const info: MediaInfo = {
        width: videoStream.width,
        height: videoStream.height,
        duration: Number(metadata.format.duration ?? 0) || 0,
        hasAudio: metadata.streams.some(s => s.codec_type === 'audio'),
      };

      logger.debug(`[FFmpeg] 📹 Probed ${filePath}: ${info.width}x${info.height}, ${info.duration}s, audio=${info.hasAudio}`);
      resolve(info);
    });
  });
}
