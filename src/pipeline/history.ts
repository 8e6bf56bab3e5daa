/**
 * @fileOverview: Process-scoped, append-only request history
 * @module: HistoryStore
 * @keyFunctions:
 *   - append(): Add a completed result record
 *   - list(): Records in submission order, optionally only the latest N
 *   - clear(): Drop the history at session end
 * @context: Appends are chained on a single promise so concurrent requests are recorded one at a time, in the order they were appended. Stored records are frozen copies that share no arrays with the caller's record
 */

import type { CollectionName } from '../retrieval/types';
import type { ResultMetadata, ResultRecord } from './types';

function frozenCopy<T>(values: readonly T[]): T[] {
  const copy = [...values];
  Object.freeze(copy);
  return copy;
}

function freezeRecord(record: ResultRecord): ResultRecord {
  const contexts: Record<CollectionName, string[]> = {
    rules: frozenCopy(record.metadata.contexts.rules),
    dictionary: frozenCopy(record.metadata.contexts.dictionary),
    qa: frozenCopy(record.metadata.contexts.qa),
  };
  Object.freeze(contexts);

  const metadata: ResultMetadata = {
    ...record.metadata,
    keywords: frozenCopy(record.metadata.keywords),
    contexts,
  };
  Object.freeze(metadata);

  return Object.freeze({ ...record, metadata });
}

export class HistoryStore {
  private readonly records: ResultRecord[] = [];
  private writeChain: Promise<void> = Promise.resolve();

  append(record: ResultRecord): Promise<void> {
    const frozen = freezeRecord(record);
    const write = this.writeChain.then(() => {
      this.records.push(frozen);
    });
    this.writeChain = write;
    return write;
  }

  list(limit?: number): ResultRecord[] {
    if (limit === undefined || limit >= this.records.length) {
      return [...this.records];
    }
    return limit <= 0 ? [] : this.records.slice(-limit);
  }

  get size(): number {
    return this.records.length;
  }

  clear(): void {
    this.records.length = 0;
  }
}
