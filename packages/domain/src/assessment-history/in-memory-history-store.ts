/**
 * @fileoverview In-Memory Assessment History Store
 *
 * Process-local implementation of the history port, for tests and for
 * embedding the engine where persistence is not needed.
 *
 * @module domain/assessment-history/in-memory-history-store
 */

import type { AssessmentRecord } from '@cardiorisk/types';

import type { AssessmentHistoryStore } from './assessment-record.js';

/** Older records are dropped once the history grows past this */
export const DEFAULT_HISTORY_LIMIT = 50;

export class InMemoryAssessmentHistoryStore implements AssessmentHistoryStore {
  private records: AssessmentRecord[] = [];

  constructor(private readonly limit: number = DEFAULT_HISTORY_LIMIT) {}

  save(record: AssessmentRecord): Promise<void> {
    this.records.push(record);
    if (this.records.length > this.limit) {
      this.records = this.records.slice(-this.limit);
    }
    return Promise.resolve();
  }

  list(): Promise<readonly AssessmentRecord[]> {
    return Promise.resolve([...this.records]);
  }

  clear(): Promise<void> {
    this.records = [];
    return Promise.resolve();
  }

  /**
   * Get number of stored records (for testing)
   */
  size(): number {
    return this.records.length;
  }
}
