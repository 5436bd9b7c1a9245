/**
 * Unit tests for the Workbook Store
 *
 * Tests creation, locking, round trips of every table and validation of
 * malformed workbooks. Each test works in its own temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as XLSX from 'xlsx';
import { WorkbookStore, withWorkbookStore } from '../../../repository/workbook-store.js';
import { CascadingEngine } from '../../../orchestrator/cascading-engine.js';
import { AuditTrailService } from '../../../services/audit-trail-service.js';
import { StoreFormatError, StoreUnavailableError } from '../../../types/index.js';

const silver = { id: 's2', name: 'silver', platform: 'platformA', side: 'business' as const };
const gold = { id: 's3', name: 'gold', platform: 'platformB', side: 'business' as const };

async function writeWorkbook(path: string, sheets: Record<string, Record<string, string | number>[]>): Promise<void> {
  const workbook = XLSX.utils.book_new();
  for (const [name, rows] of Object.entries(sheets)) {
    XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(rows), name);
  }
  await writeFile(path, XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' }));
}

describe('WorkbookStore', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cascade-store-'));
    path = join(dir, 'pipeline.xlsx');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('create', () => {
    it('should seed default stages and type mappings', async () => {
      await WorkbookStore.create(path);

      const store = await WorkbookStore.open(path);
      try {
        expect(store.repository.getAllStages().map(s => s.id)).toEqual(['s0', 's1', 's2', 's3', 's4', 's5']);
        expect(store.repository.getStage('s5')?.platform).toBe('Power BI');
        expect(store.repository.getDataTypeMappings()).toHaveLength(96);
        expect(store.repository.getTechnicalFields()).toHaveLength(28);
        expect(store.repository.getTechnicalFields().filter(f => f.stageId === 's3').map(f => f.name)[0]).toBe(
          '__{stage}_last_update_dt'
        );
        expect(store.repository.getColumnIdHighWaterMark()).toBe(0);
      } finally {
        await store.close();
      }
    });

    it('should refuse to overwrite an existing store', async () => {
      await WorkbookStore.create(path);

      await expect(WorkbookStore.create(path)).rejects.toThrow(StoreUnavailableError);
    });
  });

  describe('locking', () => {
    it('should refuse a second open until the first is closed', async () => {
      await WorkbookStore.create(path, { stages: [silver] });
      const first = await WorkbookStore.open(path);

      expect(existsSync(WorkbookStore.lockPath(path))).toBe(true);
      await expect(WorkbookStore.open(path)).rejects.toThrow(`Store ${path} is locked by another session`);

      await first.close();
      expect(existsSync(WorkbookStore.lockPath(path))).toBe(false);
      const second = await WorkbookStore.open(path);
      expect(second.isOpen).toBe(true);
      await second.close();
      expect(second.isOpen).toBe(false);
    });

    it('should release the lock when the store cannot be read', async () => {
      await expect(WorkbookStore.open(path)).rejects.toThrow(StoreUnavailableError);

      expect(existsSync(WorkbookStore.lockPath(path))).toBe(false);
    });

    it('should refuse to save a closed store', async () => {
      await WorkbookStore.create(path, { stages: [silver] });
      const store = await WorkbookStore.open(path);
      await store.close();

      await expect(store.save()).rejects.toThrow(StoreUnavailableError);
    });
  });

  describe('round trip', () => {
    it('should persist artifacts, columns, mappings and the high-water mark', async () => {
      await WorkbookStore.create(path, { stages: [silver, gold], dataTypeMappings: [] });

      await withWorkbookStore(path, repository => {
        repository.setArtifact({ id: 'dim_customer', name: 'dim_customer', stageId: 's2', artifactType: 'dimension' });
        repository.setArtifact({
          id: 'customer_dim_gold',
          name: 'customer_dim_gold',
          stageId: 's3',
          upstreamArtifact: 'dim_customer',
          relationType: 'main'
        });
        repository.createColumn({
          artifactId: 'dim_customer',
          name: 'customer_sk',
          businessName: 'Customer Key',
          dataType: 'INT',
          order: 1,
          group: 'surrogate_key',
          comment: 'surrogate',
          lookupFields: ['customer_bk', 'customer_name']
        });
        const temporary = repository.createColumn({ artifactId: 'dim_customer', name: 'tmp', dataType: 'INT', order: 2, group: 'attribute' });
        repository.deleteColumn(temporary.id);
        repository.addDataTypeMapping({ sourcePlatform: 'platformA', sourceDataType: 'INT', targetPlatform: 'platformB', targetDataType: 'BIGINT' });
      });

      const store = await WorkbookStore.open(path);
      try {
        const repository = store.repository;
        expect(repository.getArtifact('dim_customer')).toEqual({
          id: 'dim_customer',
          name: 'dim_customer',
          stageId: 's2',
          artifactType: 'dimension'
        });
        expect(repository.getArtifact('customer_dim_gold')?.upstreamArtifact).toBe('dim_customer');
        expect(repository.getColumns()).toEqual([
          {
            id: 1,
            artifactId: 'dim_customer',
            name: 'customer_sk',
            businessName: 'Customer Key',
            dataType: 'INT',
            order: 1,
            group: 'surrogate_key',
            comment: 'surrogate',
            lookupFields: ['customer_bk', 'customer_name']
          }
        ]);
        expect(repository.getColumnIdHighWaterMark()).toBe(2);
        expect(repository.getDataTypeMappings()).toEqual([
          { sourcePlatform: 'platformA', sourceDataType: 'INT', targetPlatform: 'platformB', targetDataType: 'BIGINT' }
        ]);
      } finally {
        await store.close();
      }
    });

    it('should persist the technical column table', async () => {
      await WorkbookStore.create(path, {
        stages: [silver, gold],
        dataTypeMappings: [],
        technicalFields: [
          { stageId: 's3', name: '{table_name}_SK', dataType: 'INT', group: 'surrogate_key', order: 1, carryForward: true, artifactType: 'fact' },
          { stageId: 's3', name: '__{stage}_load_id', dataType: 'STRING', group: 'technical', order: 2, carryForward: false, comment: 'load' }
        ]
      });

      const store = await WorkbookStore.open(path);
      try {
        expect(store.repository.getTechnicalFields()).toEqual([
          { stageId: 's3', name: '{table_name}_SK', dataType: 'INT', group: 'surrogate_key', order: 1, carryForward: true, artifactType: 'fact' },
          { stageId: 's3', name: '__{stage}_load_id', dataType: 'STRING', group: 'technical', order: 2, carryForward: false, comment: 'load' }
        ]);
      } finally {
        await store.close();
      }
    });

    it('should persist cascaded columns with fresh ids', async () => {
      await WorkbookStore.create(path, { stages: [silver, gold], dataTypeMappings: [] });
      await withWorkbookStore(path, repository => {
        repository.setArtifact({ id: 'dim_customer', name: 'dim_customer', stageId: 's2' });
        repository.setArtifact({ id: 'customer_dim_gold', name: 'customer_dim_gold', stageId: 's3', upstreamArtifact: 'dim_customer', relationType: 'get_key' });
        repository.createColumn({ artifactId: 'dim_customer', name: 'customer_sk', dataType: 'INT', order: 1, group: 'surrogate_key' });
      });

      const report = await withWorkbookStore(path, repository =>
        new CascadingEngine(repository, { auditTrail: new AuditTrailService({ logToConsole: false }) }).cascadeAll()
      );

      expect(report.columnsAdded).toBe(1);
      const store = await WorkbookStore.open(path);
      try {
        const cascaded = store.repository.getColumns('customer_dim_gold');
        expect(cascaded.map(c => [c.id, c.name, c.order])).toEqual([[2, 'customer_sk', 101]]);
      } finally {
        await store.close();
      }
    });

    it('should not save and should unlock when the callback throws', async () => {
      await WorkbookStore.create(path, { stages: [silver] });

      await expect(
        withWorkbookStore(path, repository => {
          repository.setStage(gold);
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');

      expect(existsSync(WorkbookStore.lockPath(path))).toBe(false);
      const store = await WorkbookStore.open(path);
      expect(store.repository.getStage('s3')).toBeUndefined();
      await store.close();
    });
  });

  describe('validation', () => {
    it('should normalise legacy group labels and bare column ids', async () => {
      await writeWorkbook(path, {
        stages: [{ stage_id: 's2', stage_name: 'silver', platform: 'platformA', side: 'Business' }],
        artifacts: [{ artifact_id: 'a1', artifact_name: 'dim_customer', stage_id: 's2' }],
        columns: [{ artifact_id: 'a1', column_id: 7, column_name: 'customer_sk', order: 1, data_type: 'INT', column_group: 'SKs' }]
      });

      const store = await WorkbookStore.open(path);
      try {
        expect(store.repository.getStage('s2')?.side).toBe('business');
        expect(store.repository.getColumn(7)?.group).toBe('surrogate_key');
        expect(store.repository.getColumnIdHighWaterMark()).toBe(7);
      } finally {
        await store.close();
      }
    });

    it('should read hand-written technical columns', async () => {
      await writeWorkbook(path, {
        stages: [{ stage_id: 's1', stage_name: 'bronze', platform: 'platformA', side: 'source' }],
        artifacts: [],
        columns: [],
        technical_columns: [
          { stage_id: 's1', column_name: '__{stage}_insert_dt', data_type: 'TIMESTAMP', order: 1, take_to_next_level: 'Yes', artifact_type: 'All' },
          { stage_id: 's1', column_name: '{field_name}_PK', data_type: 'STRING', column_group: 'Primary Key', order: 2, take_to_next_level: 0, artifact_type: 'Fact' },
          { stage_id: 's1', column_name: '__{stage}_Partition_Year', data_type: 'INT', order: 3 }
        ]
      });

      const store = await WorkbookStore.open(path);
      try {
        expect(store.repository.getTechnicalFields().map(f => [f.name, f.group, f.carryForward, f.artifactType])).toEqual([
          ['__{stage}_insert_dt', 'technical', true, undefined],
          ['{field_name}_PK', 'business_key', false, 'fact'],
          ['__{stage}_Partition_Year', 'technical', true, undefined]
        ]);
      } finally {
        await store.close();
      }
    });

    it('should reject an invalid carry-forward flag', async () => {
      await writeWorkbook(path, {
        stages: [{ stage_id: 's1', stage_name: 'bronze', platform: 'platformA', side: 'source' }],
        artifacts: [],
        columns: [],
        technical_columns: [{ stage_id: 's1', column_name: '__x', data_type: 'INT', order: 1, take_to_next_level: 'maybe' }]
      });

      await expect(WorkbookStore.open(path)).rejects.toThrow(/Invalid row 2 in table technical_columns/);
    });

    it('should reject an invalid stage side with the table and row', async () => {
      await writeWorkbook(path, {
        stages: [
          { stage_id: 's2', stage_name: 'silver', platform: 'platformA', side: 'business' },
          { stage_id: 's3', stage_name: 'gold', platform: 'platformB', side: 'sideways' }
        ],
        artifacts: [],
        columns: []
      });

      const error = await WorkbookStore.open(path).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(StoreFormatError);
      if (error instanceof StoreFormatError) {
        expect(error.table).toBe('stages');
        expect(error.row).toBe(3);
      }
      expect(existsSync(WorkbookStore.lockPath(path))).toBe(false);
    });

    it('should reject a malformed column id', async () => {
      await writeWorkbook(path, {
        stages: [{ stage_id: 's2', stage_name: 'silver', platform: 'platformA', side: 'business' }],
        artifacts: [{ artifact_id: 'a1', artifact_name: 'dim_customer', stage_id: 's2' }],
        columns: [{ artifact_id: 'a1', column_id: 'col-x', column_name: 'customer_sk', order: 1, data_type: 'INT', column_group: 'SKs' }]
      });

      await expect(WorkbookStore.open(path)).rejects.toThrow(/Invalid row 2 in table columns/);
    });

    it('should reject duplicate column ids', async () => {
      await writeWorkbook(path, {
        stages: [{ stage_id: 's2', stage_name: 'silver', platform: 'platformA', side: 'business' }],
        artifacts: [{ artifact_id: 'a1', artifact_name: 'dim_customer', stage_id: 's2' }],
        columns: [
          { artifact_id: 'a1', column_id: 'c_1', column_name: 'customer_sk', order: 1, data_type: 'INT', column_group: 'SKs' },
          { artifact_id: 'a1', column_id: 'c_1', column_name: 'customer_bk', order: 2, data_type: 'INT', column_group: 'BKs' }
        ]
      });

      await expect(WorkbookStore.open(path)).rejects.toThrow('Invalid row 3 in table columns: duplicate column id c_1');
    });

    it('should reject a workbook without a columns sheet', async () => {
      await writeWorkbook(path, {
        stages: [{ stage_id: 's2', stage_name: 'silver', platform: 'platformA', side: 'business' }],
        artifacts: []
      });

      await expect(WorkbookStore.open(path)).rejects.toThrow(StoreFormatError);
    });
  });
});
