import path from 'path';

/**
 * Security Utilities
 *
 * File path validation for names built from spreadsheet values.
 */

/**
 * Validate that a file path stays inside an allowed directory
 *
 * Performer names and locations come straight from the spreadsheet, so a
 * value such as "../secret" must not let a lookup escape the working directory.
 *
 * @param filePath - Path to validate
 * @param allowedDir - Directory the path must resolve inside of
 * @throws Error if path is outside allowed directory
 *
 * @example
 * ```typescript
 * validateFilePath('/show/Asha Rao_Mumbai.mp4', '/show'); // ✓ No error
 * validateFilePath('/show/../etc/passwd', '/show');        // ✗ Throws error
 * ```
 */
export function validateFilePath(filePath: string, allowedDir: string): void {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);
  const relative = path.relative(normalizedDir, normalizedPath);

  const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
  if (relative === '' || escapes || path.isAbsolute(relative)) {
    throw new Error(
      `Invalid file path: must be within ${normalizedDir}. ` +
      `Attempted path: ${normalizedPath}`
    );
  }
}
