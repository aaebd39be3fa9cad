/**
 * File Resolver Service
 * Matches roster records to performer clips in the working directory.
 *
 * Naming convention: "{name}_{location}.mp4", exact and case-sensitive.
 */

import { promises as fs } from 'fs';
import type { Dirent } from 'fs';
import path from 'path';
import type { PerformerRecord, ResolvedPerformer } from '../types/compilation.js';
import { MissingFileError, WorkDirectoryError, toPerformerContext } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { validateFilePath } from '../utils/security.js';

export const CLIP_EXTENSION = '.mp4';

/**
 * Expected clip filename for a record
 * No trimming, no case-folding: "Asha Rao" + "Mumbai" → "Asha Rao_Mumbai.mp4"
 */
export function expectedClipFilename(record: Pick<PerformerRecord, 'name' | 'location'>): string {
  return `${record.name}_${record.location}${CLIP_EXTENSION}`;
}

/**
 * Regular files in a directory, by exact name
 *
 * Compared against the listing rather than stat() so the match stays
 * case-sensitive on case-insensitive filesystems.
 */
async function listRegularFiles(workDir: string): Promise<Set<string>> {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(workDir, { withFileTypes: true });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new WorkDirectoryError(workDir, message, error);
  }
  const files = new Set<string>();

  for (const entry of entries) {
    if (entry.isFile()) {
      files.add(entry.name);
    } else if (entry.isSymbolicLink()) {
      const target = await fs.stat(path.join(workDir, entry.name)).catch(() => null);
      if (target?.isFile()) {
        files.add(entry.name);
      }
    }
  }
  return files;
}

function lookupClip(
  record: PerformerRecord,
  workDir: string,
  files: ReadonlySet<string>
): ResolvedPerformer | null {
  const filename = expectedClipFilename(record);
  const clipPath = path.join(workDir, filename);

  // A separator in name/location would point outside the working directory
  if (path.basename(filename) !== filename) return null;
  try {
    validateFilePath(clipPath, workDir);
  } catch {
    return null;
  }

  if (!files.has(filename)) return null;
  return { record, clip: { filename, path: clipPath } };
}

/**
 * Resolve one record's clip
 *
 * @throws MissingFileError naming the expected filename
 */
export async function resolvePerformanceClip(
  record: PerformerRecord,
  workDir: string
): Promise<ResolvedPerformer> {
  const files = await listRegularFiles(workDir);
  const resolved = lookupClip(record, workDir, files);
  if (!resolved) {
    throw new MissingFileError(expectedClipFilename(record), toPerformerContext(record));
  }
  return resolved;
}

/**
 * Resolve every record before any rendering starts
 *
 * @returns Resolved performers in roster order
 * @throws MissingFileError for the first missing clip, listing all missing clips
 */
export async function resolveRoster(
  records: readonly PerformerRecord[],
  workDir: string
): Promise<ResolvedPerformer[]> {
  const files = await listRegularFiles(workDir);
  const resolved: ResolvedPerformer[] = [];
  const missing: PerformerRecord[] = [];

  for (const record of records) {
    const match = lookupClip(record, workDir, files);
    if (match) {
      resolved.push(match);
    } else {
      missing.push(record);
    }
  }

  const [firstMissing] = missing;
  if (firstMissing) {
    const missingFilenames = missing.map(expectedClipFilename);
    logger.error('[FileResolver] ❌ Performer clips not found. Check that files are named "<Name>_<Location>.mp4"', {
      missing: missingFilenames,
    });
    throw new MissingFileError(
      expectedClipFilename(firstMissing),
      toPerformerContext(firstMissing),
      missingFilenames
    );
  }

  logger.info(`[FileResolver] ✅ All ${resolved.length} performer clip(s) found in ${workDir}`);
  return resolved;
}
