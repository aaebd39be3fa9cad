/**
 * Compilation Data Structures
 * Records and intermediate artifacts passed between the pipeline stages:
 * Roster Loader → File Resolver → Title Card Renderer → Concatenator
 */

/**
 * Spreadsheet headers a roster must contain (exact, case-sensitive)
 */
export const REQUIRED_COLUMNS = [
  'Name',
  'Location',
  'Composition',
  'Raag',
  'Taal',
  'Description',
] as const;

export type RosterColumn = typeof REQUIRED_COLUMNS[number];

/**
 * One row of the roster
 * Empty cells are kept as empty strings.
 */
export interface PerformerRecord {
  /** 1-based worksheet row the record was read from (header is row 1) */
  readonly rowNumber: number;

  readonly name: string;
  readonly location: string;
  readonly composition: string;
  readonly raag: string;
  readonly taal: string;
  readonly description: string;
}

/**
 * Performer-submitted clip located by the `{name}_{location}.mp4` convention
 */
export interface PerformanceClip {
  /** Bare filename, e.g. "Asha Rao_Mumbai.mp4" */
  filename: string;

  /** Absolute path inside the working directory */
  path: string;
}

/**
 * A roster record whose clip has been found on disk
 */
export interface ResolvedPerformer {
  record: PerformerRecord;
  clip: PerformanceClip;
}

/**
 * Still title card image rendered for one performer
 */
export interface TitleCardImage {
  record: PerformerRecord;

  /** Path to the PNG inside the run workspace */
  imagePath: string;

  /** Non-fatal layout warnings (truncated text etc.) */
  warnings: string[];
}

/**
 * Fixed-duration video segment showing a title card over silence
 * Temporary: lives in the run workspace and is removed with it.
 */
export interface TitleCardSegment {
  record: PerformerRecord;
  path: string;
  durationSeconds: number;
  warnings: string[];
}

/**
 * One title card followed by the performer's clip in the output
 */
export interface CompilationPair {
  titleCard: TitleCardSegment;
  performer: ResolvedPerformer;
}

/**
 * The single output artifact of a run
 */
export interface FinalVideo {
  path: string;

  /** Title cards plus clips: always 2 × performer count */
  segmentCount: number;
}

/**
 * Summary returned by a successful run
 */
export interface CompilationResult {
  outputPath: string;
  performerCount: number;
  segmentCount: number;
  warnings: string[];
  elapsedMs: number;
}
