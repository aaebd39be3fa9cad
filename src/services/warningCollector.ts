/**
 * Warning Collector
 *
 * Collects non-fatal warnings during a compilation run (truncated title card
 * text and similar). Warnings are logged as they arrive and summarised at the end.
 */

import { logger } from '../utils/logger.js';

export class WarningCollector {
  private readonly warnings: string[] = [];

  /**
   * Add a warning message
   */
  add(message: string): void {
    this.warnings.push(message);
    logger.warn(`[WarningCollector] ${message}`);
  }

  /**
   * Add every message from a list
   */
  addAll(messages: readonly string[]): void {
    for (const message of messages) {
      this.add(message);
    }
  }

  /**
   * Get all collected warnings
   */
  getWarnings(): string[] {
    return [...this.warnings];
  }

  /**
   * Check if any warnings have been collected
   */
  hasWarnings(): boolean {
    return this.warnings.length > 0;
  }

  /**
   * Get the number of collected warnings
   */
  get count(): number {
    return this.warnings.length;
  }
}
