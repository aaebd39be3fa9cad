/**
 * Unit tests for security.ts
 */

import { describe, it, expect } from '@jest/globals';
import path from 'path';
import { validateFilePath } from '../../utils/security.js';

const SHOW_DIR = path.resolve('/show');

describe('validateFilePath()', () => {
  it('should accept a file directly inside the directory', () => {
    expect(() => validateFilePath(path.join(SHOW_DIR, 'Asha Rao_Mumbai.mp4'), SHOW_DIR)).not.toThrow();
  });

  it('should reject a path that climbs out of the directory', () => {
    expect(() => validateFilePath(path.join(SHOW_DIR, '..', 'etc', 'passwd'), SHOW_DIR))
      .toThrow(`Invalid file path: must be within ${SHOW_DIR}`);
  });

  it('should accept a file whose name starts with two dots', () => {
    expect(() => validateFilePath(path.join(SHOW_DIR, '..Asha_Mumbai.mp4'), SHOW_DIR)).not.toThrow();
  });

  it('should reject the parent directory', () => {
    expect(() => validateFilePath(path.dirname(SHOW_DIR), SHOW_DIR)).toThrow('Invalid file path');
  });

  it('should reject the directory itself', () => {
    expect(() => validateFilePath(SHOW_DIR, SHOW_DIR)).toThrow('Invalid file path');
  });

  it('should reject a sibling directory sharing the prefix', () => {
    expect(() => validateFilePath(path.resolve('/show-archive/clip.mp4'), SHOW_DIR)).toThrow('Invalid file path');
  });
});
