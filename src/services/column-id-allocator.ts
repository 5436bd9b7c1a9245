/**
 * Column Identity Allocator
 * Hands out strictly increasing column ids, seeded from the store's
 * high-water mark so ids freed by deletions are never issued again.
 */

import { IColumnIdAllocator } from '../interfaces/services.js';
import { IPipelineRepository } from '../repository/pipeline-repository.js';

export class ColumnIdAllocator implements IColumnIdAllocator {
  private last: number;

  constructor(highWaterMark: number) {
    if (!Number.isInteger(highWaterMark) || highWaterMark < 0) {
      throw new RangeError(`High-water mark must be a non-negative integer, got ${highWaterMark}`);
    }
    this.last = highWaterMark;
  }

  /**
   * Allocator seeded from the repository's high-water mark
   */
  static fromRepository(repository: IPipelineRepository): ColumnIdAllocator {
    return new ColumnIdAllocator(repository.getColumnIdHighWaterMark());
  }

  next(): number {
    this.last += 1;
    return this.last;
  }

  /** Id the next call to next() returns */
  peek(): number {
    return this.last + 1;
  }
}
