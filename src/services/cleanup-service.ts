/**
 * Cleanup Service
 * Operator-triggered maintenance over the column store: duplicate removal
 * and dense re-enumeration of column ids. Both passes are idempotent.
 */

import { ICleanupService } from '../interfaces/services.js';
import { IPipelineRepository } from '../repository/pipeline-repository.js';
import { Column, DuplicateCleanupResult, ReenumerationResult } from '../types/index.js';
import { AuditTrailService, getAuditTrailService } from './audit-trail-service.js';

export class CleanupService implements ICleanupService {
  constructor(
    private readonly repository: IPipelineRepository,
    private readonly auditTrail: AuditTrailService = getAuditTrailService()
  ) {}

  /**
   * Keep the first column of every (artifact, name) pair in store order
   */
  removeDuplicateColumns(): DuplicateCleanupResult {
    const seen = new Set<string>();
    const kept: Column[] = [];
    const byArtifact: Record<string, number> = {};

    for (const column of this.repository.getColumns()) {
      const key = `${column.artifactId}\u0000${column.name}`;
      if (seen.has(key)) {
        byArtifact[column.artifactId] = (byArtifact[column.artifactId] ?? 0) + 1;
        continue;
      }
      seen.add(key);
      kept.push(column);
    }

    const result: DuplicateCleanupResult = {
      removed: Object.values(byArtifact).reduce((sum, count) => sum + count, 0),
      byArtifact
    };
    if (result.removed > 0) {
      this.repository.replaceAllColumns(kept);
    }
    this.auditTrail.logDuplicatesRemoved(result);
    return result;
  }

  /**
   * Rewrite column ids to 1..N ordered by artifact position, then column
   * order, then previous id. Columns of artifacts missing from the artifacts
   * table go last, grouped by artifact id.
   */
  reenumerateIds(): ReenumerationResult {
    const position = new Map<string, number>();
    this.repository.getAllArtifacts().forEach((artifact, index) => position.set(artifact.id, index));

    const sorted = this.repository.getColumns().sort((a, b) => {
      const posA = position.get(a.artifactId);
      const posB = position.get(b.artifactId);
      if (posA !== undefined && posB !== undefined && posA !== posB) {
        return posA - posB;
      }
      if (posA === undefined && posB !== undefined) {
        return 1;
      }
      if (posA !== undefined && posB === undefined) {
        return -1;
      }
      if (posA === undefined && posB === undefined && a.artifactId !== b.artifactId) {
        return a.artifactId < b.artifactId ? -1 : 1;
      }
      return a.order - b.order || a.id - b.id;
    });

    let remapped = 0;
    const renumbered = sorted.map((column, index) => {
      const id = index + 1;
      if (column.id !== id) {
        remapped++;
      }
      return { ...column, id };
    });

    this.repository.replaceAllColumns(renumbered);
    this.repository.resetColumnIdHighWaterMark(renumbered.length);

    const result: ReenumerationResult = { total: renumbered.length, remapped };
    this.auditTrail.logIdsReenumerated(result);
    return result;
  }

  /**
   * Duplicate removal followed by re-enumeration
   */
  runMaintenance(): { duplicates: DuplicateCleanupResult; reenumeration: ReenumerationResult } {
    const duplicates = this.removeDuplicateColumns();
    const reenumeration = this.reenumerateIds();
    return { duplicates, reenumeration };
  }
}
