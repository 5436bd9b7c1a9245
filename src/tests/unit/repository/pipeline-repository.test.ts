/**
 * Unit tests for the in-memory Pipeline Repository
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryPipelineRepository } from '../../../repository/pipeline-repository.js';
import { Column } from '../../../types/index.js';

function col(id: number, name: string, artifactId = 'a1'): Column {
  return { id, artifactId, name, dataType: 'INT', order: id, group: 'attribute' };
}

describe('InMemoryPipelineRepository', () => {
  let repository: InMemoryPipelineRepository;

  beforeEach(() => {
    repository = new InMemoryPipelineRepository();
    repository.setStage({ id: 's2', name: 'silver', platform: 'platformA', side: 'business' });
    repository.setArtifact({ id: 'a1', name: 'dim_customer', stageId: 's2' });
  });

  describe('stages', () => {
    it('should reject changes to a referenced stage', () => {
      expect(() =>
        repository.setStage({ id: 's2', name: 'silver', platform: 'platformB', side: 'business' })
      ).toThrow('Stage s2 is referenced by artifacts and cannot be changed');
    });

    it('should accept an unchanged stage and changes to unreferenced stages', () => {
      repository.setStage({ id: 's2', name: 'silver', platform: 'platformA', side: 'business' });
      repository.setStage({ id: 's3', name: 'gold', platform: 'platformA', side: 'business' });
      repository.setStage({ id: 's3', name: 'gold', platform: 'platformB', side: 'business' });

      expect(repository.getStage('s3')?.platform).toBe('platformB');
      expect(repository.getAllStages()).toHaveLength(2);
    });
  });

  describe('columns', () => {
    it('should assign sequential ids and audit the addition', () => {
      const first = repository.createColumn({ artifactId: 'a1', name: 'x', dataType: 'INT', order: 1, group: 'attribute' });
      const second = repository.createColumn({ artifactId: 'a1', name: 'y', dataType: 'INT', order: 2, group: 'attribute' });

      expect([first.id, second.id]).toEqual([1, 2]);
      const additions = repository.getAuditEntries('Artifact', 'a1').filter(e => e.action === 'add_columns');
      expect(additions.map(e => e.newState)).toEqual([{ columnIds: [1] }, { columnIds: [2] }]);
    });

    it('should keep the high-water mark across deletions', () => {
      repository.addColumns([col(1, 'x'), col(2, 'y')]);
      repository.deleteColumn(2);

      expect(repository.getColumnIdHighWaterMark()).toBe(2);
      expect(repository.createColumn({ artifactId: 'a1', name: 'z', dataType: 'INT', order: 3, group: 'attribute' }).id).toBe(3);
    });

    it('should reject ids already in use', () => {
      repository.addColumns([col(1, 'x')]);

      expect(() => repository.addColumns([col(1, 'y')])).toThrow('Column id 1 is already in use');
      expect(() => repository.addColumns([col(5, 'y'), col(5, 'z')])).toThrow('Column id 5 is already in use');
      expect(repository.getColumns()).toHaveLength(1);
    });

    it('should reject blank names and invalid ids', () => {
      expect(() => repository.addColumns([col(1, '   ')])).toThrow('Column 1 of artifact a1 has a blank name');
      expect(() => repository.addColumns([col(0, 'x')])).toThrow('Column id 0 must be a positive integer');
    });

    it('should filter columns by artifact', () => {
      repository.addColumns([col(1, 'x'), col(2, 'y', 'a2'), col(3, 'z')]);

      expect(repository.getColumns('a1').map(c => c.id)).toEqual([1, 3]);
      expect(repository.getColumn(2)?.artifactId).toBe('a2');
    });

    it('should replace all columns and reject duplicate ids', () => {
      repository.addColumns([col(1, 'x'), col(2, 'y')]);

      repository.replaceAllColumns([col(9, 'z')]);
      expect(repository.getColumns().map(c => c.id)).toEqual([9]);
      expect(repository.getColumnIdHighWaterMark()).toBe(9);

      expect(() => repository.replaceAllColumns([col(3, 'a'), col(3, 'b')])).toThrow('Column id 3 appears more than once');
    });

    it('should reorder one artifact within its own slots', () => {
      repository.addColumns([col(1, 'c'), col(2, 'x', 'a2'), col(3, 'a'), col(4, 'b')]);

      const changed = repository.reorderColumns('a1', (a, b) => a.name.localeCompare(b.name));

      expect(changed).toBe(true);
      expect(repository.getColumns().map(c => c.id)).toEqual([3, 2, 4, 1]);
      expect(repository.getAuditEntries('Artifact', 'a1').at(-1)?.action).toBe('reorder_columns');
      expect(repository.reorderColumns('a1', (a, b) => a.name.localeCompare(b.name))).toBe(false);
    });

    it('should not lower the high-water mark below ids in use', () => {
      repository.addColumns([col(4, 'x')]);

      expect(() => repository.resetColumnIdHighWaterMark(3)).toThrow(/below the largest column id in use/);
      repository.resetColumnIdHighWaterMark(4);
      expect(repository.getColumnIdHighWaterMark()).toBe(4);
    });
  });

  describe('artifacts', () => {
    it('should delete an artifact with its columns', () => {
      repository.addColumns([col(1, 'x'), col(2, 'y', 'a2')]);

      expect(repository.deleteArtifact('a1')).toBe(true);
      expect(repository.getArtifact('a1')).toBeUndefined();
      expect(repository.getColumns().map(c => c.id)).toEqual([2]);
      expect(repository.deleteArtifact('a1')).toBe(false);
    });
  });

  describe('data type mappings', () => {
    it('should keep mappings in insertion order', () => {
      repository.addDataTypeMapping({ sourcePlatform: 'platformA', sourceDataType: 'INT', targetPlatform: 'platformB', targetDataType: 'BIGINT' });
      repository.addDataTypeMapping({ sourcePlatform: 'platformA', sourceDataType: 'BIT', targetPlatform: 'platformB', targetDataType: 'BOOLEAN' });

      expect(repository.getDataTypeMappings().map(m => m.targetDataType)).toEqual(['BIGINT', 'BOOLEAN']);
    });
  });

  describe('technical column table', () => {
    it('should replace the table and hand out copies', () => {
      repository.setTechnicalFields([
        { stageId: 's2', name: '__{stage}_last_update_dt', dataType: 'TIMESTAMP', group: 'technical', order: 1, carryForward: false }
      ]);

      const fields = repository.getTechnicalFields();
      fields[0].name = 'changed';

      expect(repository.getTechnicalFields().map(f => f.name)).toEqual(['__{stage}_last_update_dt']);
      expect(repository.getAuditEntries('TechnicalFieldTable')).toHaveLength(1);
    });
  });
});
