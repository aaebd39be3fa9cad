/**
 * Integration tests for pipeline.ts
 *
 * Stages are replaced with in-memory fakes except where the test needs the
 * real Roster Loader.
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import ExcelJS from 'exceljs';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { CompilationConfig } from '../../config/compilation.js';
import { expectedClipFilename } from '../../services/fileResolver.js';
import { runCompilation } from '../../services/pipeline.js';
import type { CompilationStages } from '../../services/pipeline.js';
import { loadRoster } from '../../services/rosterLoader.js';
import type { CompilationPair, PerformerRecord } from '../../types/compilation.js';
import {
  FileFormatError,
  FontUnavailableError,
  MissingColumnError,
  RenderError,
} from '../../types/errors.js';

function createRecord(rowNumber: number, name: string, location: string): PerformerRecord {
  return {
    rowNumber,
    name,
    location,
    composition: 'Bandish',
    raag: 'Yaman',
    taal: 'Teentaal',
    description: 'Evening raga',
  };
}

const ROSTER = [
  createRecord(2, 'Asha Rao', 'Mumbai'),
  createRecord(3, 'Chirag Agarwal', 'London'),
  createRecord(4, 'Meera Iyer', 'Chennai'),
];

/** Segment sequence the concatenator was asked to join */
function segmentSequence(pairs: readonly CompilationPair[]): string[] {
  return pairs.flatMap(pair => [
    `card:${pair.titleCard.record.rowNumber}`,
    `clip:${pair.performer.clip.filename}`,
  ]);
}

describe('runCompilation()', () => {
  let workDir: string;
  let config: CompilationConfig;
  let records: PerformerRecord[];
  let concatenatedPairs: CompilationPair[];
  let workspaces: string[];

  const checkFont = jest.fn<CompilationStages['checkFont']>();
  const loadRosterStage = jest.fn<CompilationStages['loadRoster']>();
  const resolveRosterStage = jest.fn<CompilationStages['resolveRoster']>();
  const renderTitleCard = jest.fn<CompilationStages['renderTitleCard']>();
  const concatenate = jest.fn<CompilationStages['concatenate']>();

  const stages: CompilationStages = {
    checkFont,
    loadRoster: loadRosterStage,
    resolveRoster: resolveRosterStage,
    renderTitleCard,
    concatenate,
  };

  beforeEach(() => {
    jest.resetAllMocks();
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'pipeline-test-'));
    config = {
      workDir,
      spreadsheetPath: path.join(workDir, 'Performer Data.xlsx'),
      outputPath: path.join(workDir, 'FINAL_VIDEO.mp4'),
      cardDurationSeconds: 5,
      fontPath: '/fonts/placeholder-bold.ttf',
      width: 1920,
      height: 1080,
      fps: 30,
      titleCase: false,
    };
    records = [...ROSTER];
    concatenatedPairs = [];
    workspaces = [];

    checkFont.mockResolvedValue(undefined);
    loadRosterStage.mockImplementation(async () => records);
    resolveRosterStage.mockImplementation(async (rosterRecords, dir) =>
      rosterRecords.map(record => {
        const filename = expectedClipFilename(record);
        return { record, clip: { filename, path: path.join(dir, filename) } };
      })
    );
    renderTitleCard.mockImplementation(async (record, workspaceDir, runConfig) => {
      workspaces.push(workspaceDir);
      return {
        record,
        path: path.join(workspaceDir, `card-${record.rowNumber}.mp4`),
        durationSeconds: runConfig.cardDurationSeconds,
        warnings: [],
      };
    });
    concatenate.mockImplementation(async (pairs, outputPath) => {
      concatenatedPairs = [...pairs];
      return { path: outputPath, segmentCount: pairs.length * 2 };
    });
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should produce 2N segments alternating title card and clip in roster order', async () => {
    const result = await runCompilation(config, stages);

    expect(segmentSequence(concatenatedPairs)).toEqual([
      'card:2', 'clip:Asha Rao_Mumbai.mp4',
      'card:3', 'clip:Chirag Agarwal_London.mp4',
      'card:4', 'clip:Meera Iyer_Chennai.mp4',
    ]);
    expect(result).toMatchObject({
      outputPath: config.outputPath,
      performerCount: 3,
      segmentCount: 6,
      warnings: [],
    });
  });

  it('should follow the row order of the roster', async () => {
    records = [ROSTER[2], ROSTER[0], ROSTER[1]];

    await runCompilation(config, stages);

    expect(segmentSequence(concatenatedPairs)).toEqual([
      'card:4', 'clip:Meera Iyer_Chennai.mp4',
      'card:2', 'clip:Asha Rao_Mumbai.mp4',
      'card:3', 'clip:Chirag Agarwal_London.mp4',
    ]);
  });

  it('should stop before resolving clips when a required column is missing', async () => {
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet('Performers');
    worksheet.addRow(['Name', 'Location', 'Composition', 'Taal', 'Description']);
    worksheet.addRow(['Asha Rao', 'Mumbai', 'Bandish', 'Teentaal', 'Evening raga']);
    await workbook.xlsx.writeFile(config.spreadsheetPath);

    const result = runCompilation(config, { ...stages, loadRoster });

    await expect(result).rejects.toBeInstanceOf(MissingColumnError);
    await expect(result).rejects.toMatchObject({ missingColumns: ['Raag'] });
    expect(resolveRosterStage).not.toHaveBeenCalled();
    expect(renderTitleCard).not.toHaveBeenCalled();
    expect(fs.existsSync(config.outputPath)).toBe(false);
  });

  it('should abort before reading the roster when the font is unavailable', async () => {
    checkFont.mockRejectedValue(new FontUnavailableError(config.fontPath, 'file not found or not readable'));

    await expect(runCompilation(config, stages)).rejects.toBeInstanceOf(FontUnavailableError);
    expect(loadRosterStage).not.toHaveBeenCalled();
  });

  it('should reject a roster with no performer rows', async () => {
    records = [];

    const result = runCompilation(config, stages);

    await expect(result).rejects.toBeInstanceOf(FileFormatError);
    await expect(result).rejects.toThrow('no performer rows found below the header row');
    expect(resolveRosterStage).not.toHaveBeenCalled();
  });

  it('should wrap a render failure with the performer row and skip concatenation', async () => {
    renderTitleCard.mockImplementation(async (record, workspaceDir) => {
      workspaces.push(workspaceDir);
      if (record.rowNumber === 3) {
        throw new Error('disk full');
      }
      return { record, path: path.join(workspaceDir, 'card.mp4'), durationSeconds: 5, warnings: [] };
    });

    const result = runCompilation(config, stages);

    await expect(result).rejects.toBeInstanceOf(RenderError);
    await expect(result).rejects.toThrow('Failed to render title card for Chirag Agarwal (row 3): disk full');
    await expect(result).rejects.toMatchObject({ performer: { rowNumber: 3 } });
    expect(concatenate).not.toHaveBeenCalled();
  });

  it('should remove the temporary workspace after success and after failure', async () => {
    await runCompilation(config, stages);
    concatenate.mockRejectedValue(new Error('boom'));
    await expect(runCompilation(config, stages)).rejects.toThrow('boom');

    expect(workspaces.length).toBeGreaterThan(0);
    for (const workspaceDir of workspaces) {
      expect(fs.existsSync(workspaceDir)).toBe(false);
    }
  });

  it('should collect title card warnings into the result', async () => {
    renderTitleCard.mockImplementation(async (record, workspaceDir) => ({
      record,
      path: path.join(workspaceDir, `card-${record.rowNumber}.mp4`),
      durationSeconds: 5,
      warnings: record.rowNumber === 4 ? ['Title card name for Meera Iyer (row 4) was truncated to fit the frame'] : [],
    }));

    const result = await runCompilation(config, stages);

    expect(result.warnings).toEqual(['Title card name for Meera Iyer (row 4) was truncated to fit the frame']);
  });

  it('should pass the configured paths to each stage', async () => {
    await runCompilation(config, stages);

    expect(checkFont).toHaveBeenCalledWith('/fonts/placeholder-bold.ttf');
    expect(loadRosterStage).toHaveBeenCalledWith(config.spreadsheetPath);
    expect(resolveRosterStage).toHaveBeenCalledWith(records, workDir);
    expect(concatenate.mock.calls[0]?.[1]).toBe(config.outputPath);
  });
});
