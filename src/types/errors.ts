/**
 * Compilation Error Types
 *
 * Every failure raised by the pipeline carries the stage it happened in and,
 * for record-level failures, the performer row that caused it.
 */

import type { PerformerRecord } from './compilation.js';

export type CompilationStage =
  | 'config'        // Invalid configuration values
  | 'preflight'     // Font check before any record work
  | 'roster'        // Spreadsheet parsing
  | 'resolve'       // Clip lookup in the working directory
  | 'render'        // Title card image / segment encoding
  | 'concatenate';  // Normalization and final assembly

/**
 * Identifies the roster row a record-level error belongs to
 */
export interface PerformerContext {
  name: string;
  location: string;
  rowNumber: number;
}

export function toPerformerContext(record: PerformerRecord): PerformerContext {
  return {
    name: record.name,
    location: record.location,
    rowNumber: record.rowNumber,
  };
}

interface CompilationErrorOptions {
  performer?: PerformerContext;
  cause?: unknown;
}

export class CompilationError extends Error {
  readonly stage: CompilationStage;
  readonly performer?: PerformerContext;

  constructor(message: string, stage: CompilationStage, options: CompilationErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.stage = stage;
    this.performer = options.performer;
  }
}

export class ConfigurationError extends CompilationError {
  readonly key: string;

  constructor(key: string, reason: string) {
    super(`Invalid configuration for ${key}: ${reason}`, 'config');
    this.key = key;
  }
}

/**
 * Spreadsheet could not be opened or parsed
 */
export class FileFormatError extends CompilationError {
  readonly filePath: string;

  constructor(filePath: string, reason: string, cause?: unknown) {
    super(`Could not read roster spreadsheet ${filePath}: ${reason}`, 'roster', { cause });
    this.filePath = filePath;
  }
}

/**
 * One or more required headers are absent from the header row
 */
export class MissingColumnError extends CompilationError {
  readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super(
      `Roster is missing required column(s): ${missingColumns.join(', ')}. ` +
      'Header names must match exactly (case-sensitive).',
      'roster'
    );
    this.missingColumns = missingColumns;
  }
}

/**
 * A performer's clip was not found under its expected filename
 */
export class MissingFileError extends CompilationError {
  /** Expected filename of the first missing clip */
  readonly expectedFilename: string;

  /** Every missing filename, in roster order */
  readonly missingFilenames: string[];

  constructor(expectedFilename: string, performer: PerformerContext, missingFilenames: string[] = [expectedFilename]) {
    const others = missingFilenames.filter(filename => filename !== expectedFilename);
    super(
      `Performer clip not found: ${expectedFilename} (row ${performer.rowNumber}, ${performer.name})` +
      (others.length > 0 ? `. Also missing:\n${others.join('\n')}` : ''),
      'resolve',
      { performer }
    );
    this.expectedFilename = expectedFilename;
    this.missingFilenames = missingFilenames;
  }
}

/**
 * The working directory holding the clips could not be listed
 */
export class WorkDirectoryError extends CompilationError {
  readonly workDir: string;

  constructor(workDir: string, reason: string, cause?: unknown) {
    super(`Could not read working directory ${workDir}: ${reason}`, 'resolve', { cause });
    this.workDir = workDir;
  }
}

export class FontUnavailableError extends CompilationError {
  readonly fontPath: string;

  constructor(fontPath: string, reason: string, cause?: unknown) {
    super(`Title card font unavailable at ${fontPath}: ${reason}`, 'preflight', { cause });
    this.fontPath = fontPath;
  }
}

/**
 * Title card image or segment encoding failed for one performer
 */
export class RenderError extends CompilationError {
  constructor(performer: PerformerContext, reason: string, cause?: unknown) {
    super(
      `Failed to render title card for ${performer.name} (row ${performer.rowNumber}): ${reason}`,
      'render',
      { performer, cause }
    );
  }
}

export class ConcatenationError extends CompilationError {
  /** Segment that could not be read or normalized, when known */
  readonly segmentPath?: string;

  constructor(reason: string, options: CompilationErrorOptions & { segmentPath?: string } = {}) {
    super(`Failed to assemble final video: ${reason}`, 'concatenate', options);
    this.segmentPath = options.segmentPath;
  }
}
