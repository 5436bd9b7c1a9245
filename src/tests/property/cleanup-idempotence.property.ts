/**
 * **Property: Cleanup Idempotence**
 *
 * For any column store, duplicate removal leaves unique (artifact, name)
 * pairs and changes nothing when repeated; re-enumeration produces the
 * dense id range 1..N.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { CleanupService } from '../../services/cleanup-service.js';
import { AuditTrailService } from '../../services/audit-trail-service.js';
import { InMemoryPipelineRepository } from '../../repository/pipeline-repository.js';
import { ColumnDraft, columnDraftGenerator } from '../generators/index.js';

// Property test configuration - minimum 100 iterations
const propertyConfig = {
  numRuns: 100,
  verbose: false
};

interface StoreEntry {
  artifactId: string;
  draft: ColumnDraft;
}

const storeGenerator = (): fc.Arbitrary<StoreEntry[]> =>
  fc.array(
    fc.record({
      artifactId: fc.constantFrom('a1', 'a2', 'a3', 'unlisted'),
      draft: columnDraftGenerator()
    }),
    { maxLength: 30 }
  );

function buildRepository(entries: StoreEntry[]): InMemoryPipelineRepository {
  const repository = new InMemoryPipelineRepository();
  repository.setStage({ id: 's3', name: 'gold', platform: 'platformB', side: 'business' });
  ['a1', 'a2', 'a3'].forEach(id => repository.setArtifact({ id, name: id, stageId: 's3' }));
  entries.forEach(entry => repository.createColumn({ ...entry.draft, artifactId: entry.artifactId }));
  return repository;
}

describe('Property: Cleanup Idempotence', () => {
  it('should leave unique names and be idempotent', () => {
    fc.assert(
      fc.property(storeGenerator(), entries => {
        const repository = buildRepository(entries);
        const service = new CleanupService(repository, new AuditTrailService({ logToConsole: false }));

        const first = service.removeDuplicateColumns();
        const keys = repository.getColumns().map(c => `${c.artifactId}/${c.name}`);
        expect(new Set(keys).size).toBe(keys.length);
        expect(first.removed).toBe(entries.length - keys.length);

        const second = service.removeDuplicateColumns();
        expect(second.removed).toBe(0);
        expect(repository.getColumns()).toHaveLength(keys.length);
        return true;
      }),
      propertyConfig
    );
  });

  it('should re-enumerate ids densely', () => {
    fc.assert(
      fc.property(storeGenerator(), entries => {
        const repository = buildRepository(entries);
        const service = new CleanupService(repository, new AuditTrailService({ logToConsole: false }));

        const { reenumeration } = service.runMaintenance();

        const ids = repository.getColumns().map(c => c.id).sort((a, b) => a - b);
        expect(ids).toEqual(Array.from({ length: reenumeration.total }, (_, i) => i + 1));
        expect(repository.getColumnIdHighWaterMark()).toBe(reenumeration.total);
        return true;
      }),
      propertyConfig
    );
  });
});
