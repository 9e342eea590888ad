/**
 * Warning Collector
 *
 * Recoverable validation and parse problems of one printer session.
 * Every report is also logged.
 *
 * @module printer/services/escpos/WarningCollector
 */

import { EscPosWarning } from '../../types';
import { debugLogger } from '../../../shared/utils/debug-logger';

/** Warnings kept per session; older ones are dropped first */
export const MAX_WARNINGS = 1000;

export class WarningCollector {
  private entries: EscPosWarning[] = [];
  private dropped = 0;

  constructor(
    private readonly sessionId?: string,
    private readonly maxWarnings: number = MAX_WARNINGS
  ) {}

  report(warning: EscPosWarning): void {
    this.entries.push(warning);

    // Keep only the most recent warnings
    if (this.entries.length > this.maxWarnings) {
      const excess = this.entries.length - this.maxWarnings;
      this.entries = this.entries.slice(excess);
      this.dropped += excess;
    }

    debugLogger.warn(
      warning.message,
      { code: warning.code, kind: warning.kind, option: warning.option, value: warning.value },
      'EscPos',
      { sessionId: this.sessionId }
    );
  }

  /**
   * Number of warnings reported so far; pass it to since() to scope a call
   */
  get size(): number {
    return this.dropped + this.entries.length;
  }

  /**
   * Warnings reported after `index`, as far as they are still kept
   */
  since(index: number): EscPosWarning[] {
    return this.entries.slice(Math.max(0, index - this.dropped));
  }

  getAll(): EscPosWarning[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries = [];
    this.dropped = 0;
  }
}
