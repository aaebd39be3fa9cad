/**
 * Compilation Pipeline
 *
 * Linear batch run: font preflight → Roster Loader → File Resolver →
 * Title Card Renderer → Concatenator. Each stage takes the previous stage's
 * output; any error aborts the run and no output file is produced.
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import type { CompilationConfig } from '../config/compilation.js';
import type {
  CompilationPair,
  CompilationResult,
  FinalVideo,
  PerformerRecord,
  ResolvedPerformer,
  TitleCardSegment,
} from '../types/compilation.js';
import { CompilationError, FileFormatError, RenderError, toPerformerContext } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { concatenateSegments } from './concatenator.js';
import { logWarning } from './errorTracking.js';
import { resolveRoster } from './fileResolver.js';
import { loadRoster } from './rosterLoader.js';
import { assertFontAvailable, renderTitleCard } from './titleCard.js';
import { WarningCollector } from './warningCollector.js';

/**
 * Replaceable stage implementations (fakes in tests)
 */
export interface CompilationStages {
  checkFont(fontPath: string): Promise<void>;
  loadRoster(spreadsheetPath: string): Promise<PerformerRecord[]>;
  resolveRoster(records: readonly PerformerRecord[], workDir: string): Promise<ResolvedPerformer[]>;
  renderTitleCard(record: PerformerRecord, workspaceDir: string, config: CompilationConfig): Promise<TitleCardSegment>;
  concatenate(
    pairs: readonly CompilationPair[],
    outputPath: string,
    workspaceDir: string,
    config: CompilationConfig
  ): Promise<FinalVideo>;
}

export const defaultStages: CompilationStages = {
  checkFont: assertFontAvailable,
  loadRoster,
  resolveRoster,
  renderTitleCard,
  concatenate: concatenateSegments,
};

/**
 * Utility function to measure and log execution time of async operations
 * @param stepName - Name of the step being timed
 * @param fn - Async function to execute
 * @returns Result of the async function
 */
async function timeStep<T>(stepName: string, fn: () => Promise<T>): Promise<T> {
  const startTime = Date.now();
  logger.info(`⏱️  [${stepName}] Starting...`);

  try {
    const result = await fn();
    const duration = ((Date.now() - startTime) / 1000).toFixed(2);
    logger.info(`✅ [${stepName}] Completed in ${duration}s`);
    return result;
  } catch (error) {
    const duration = ((Date.now() - startTime) / 1000).toFixed(2);
    logger.error(`❌ [${stepName}] Failed after ${duration}s`);
    throw error;
  }
}

/**
 * Run one complete compilation
 *
 * Intermediate artifacts live in a private temp workspace that is removed
 * whether the run succeeds or fails.
 *
 * @param config - Run configuration
 * @param stages - Stage implementations (defaults to the real ones)
 * @returns Summary of the produced video
 * @throws CompilationError subclass identifying the failing stage and row
 */
export async function runCompilation(
  config: CompilationConfig,
  stages: CompilationStages = defaultStages
): Promise<CompilationResult> {
  const overallStartTime = Date.now();
  const warnings = new WarningCollector();

  logger.info('═══════════════════════════════════════════════');
  logger.info(`Starting compilation in ${config.workDir}`);

  // Structural checks first: nothing record-level runs with a missing font
  await timeStep('Font Preflight', () => stages.checkFont(config.fontPath));

  const records = await timeStep('Load Roster', () => stages.loadRoster(config.spreadsheetPath));
  if (records.length === 0) {
    throw new FileFormatError(config.spreadsheetPath, 'no performer rows found below the header row');
  }

  const performers = await timeStep('Resolve Clips', () => stages.resolveRoster(records, config.workDir));

  const workspaceDir = await fs.mkdtemp(path.join(os.tmpdir(), 'performer-compilation-'));
  logger.debug(`📁 Created workspace: ${workspaceDir}`);

  try {
    const pairs = await timeStep('Render Title Cards', async () => {
      const rendered: CompilationPair[] = [];
      for (const performer of performers) {
        const titleCard = await renderCard(stages, performer.record, workspaceDir, config);
        warnings.addAll(titleCard.warnings);
        rendered.push({ titleCard, performer });
      }
      return rendered;
    });

    const video = await timeStep('Concatenate', () =>
      stages.concatenate(pairs, config.outputPath, workspaceDir, config)
    );

    if (warnings.hasWarnings()) {
      logWarning(`${warnings.count} title card warning(s) during compilation`, {
        operation: 'compilation',
        warnings: warnings.getWarnings(),
      });
    }

    const elapsedMs = Date.now() - overallStartTime;
    logger.info(`🎉 Final video is ready! ${video.path}`, {
      performers: performers.length,
      segments: video.segmentCount,
      durationMs: elapsedMs,
    });

    return {
      outputPath: video.path,
      performerCount: performers.length,
      segmentCount: video.segmentCount,
      warnings: warnings.getWarnings(),
      elapsedMs,
    };
  } finally {
    await fs.rm(workspaceDir, { recursive: true, force: true });
    logger.debug(`🧹 Cleaned up workspace: ${workspaceDir}`);
  }
}

async function renderCard(
  stages: CompilationStages,
  record: PerformerRecord,
  workspaceDir: string,
  config: CompilationConfig
): Promise<TitleCardSegment> {
  try {
    return await stages.renderTitleCard(record, workspaceDir, config);
  } catch (error) {
    if (error instanceof CompilationError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new RenderError(toPerformerContext(record), message, error);
  }
}
