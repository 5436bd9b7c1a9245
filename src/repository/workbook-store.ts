/**
 * Workbook store
 *
 * Persists the pipeline model as an xlsx workbook with one sheet per table.
 * An open store holds an exclusive sidecar lock file (<path>.lock) until it
 * is closed; a second open of a locked store fails immediately.
 */

import { FileHandle, open, readFile, rename, unlink, writeFile } from 'node:fs/promises';
import * as XLSX from 'xlsx';
import { defaultTechnicalFields } from '../services/technical-field-catalog.js';
import { defaultTypeMappings } from '../services/type-mapping-table.js';
import {
  DataTypeMapping,
  Stage,
  StoreFormatError,
  StoreUnavailableError,
  TechnicalFieldDefinition
} from '../types/index.js';
import { InMemoryPipelineRepository, IPipelineRepository } from './pipeline-repository.js';
import {
  ARTIFACT_HEADERS,
  COLUMN_HEADERS,
  HIGH_WATER_MARK_KEY,
  MAPPING_HEADERS,
  METADATA_HEADERS,
  STAGE_HEADERS,
  STORE_TABLES,
  TECHNICAL_COLUMN_HEADERS,
  SheetRow,
  artifactFromRow,
  artifactRowSchema,
  artifactToRow,
  columnFromRow,
  columnRowSchema,
  columnToRow,
  formatColumnId,
  mappingFromRow,
  mappingRowSchema,
  mappingToRow,
  metadataRowSchema,
  parseRows,
  stageFromRow,
  stageRowSchema,
  stageToRow,
  technicalColumnRowSchema,
  technicalFieldFromRow,
  technicalFieldToRow
} from './store-records.js';

/**
 * Stages of a freshly created store
 */
export const DEFAULT_STAGES: Stage[] = [
  { id: 's0', name: '0_drop_zone', platform: 'Azure SQL', side: 'source' },
  { id: 's1', name: '1_bronze', platform: 'Azure SQL', side: 'source' },
  { id: 's2', name: '2_silver', platform: 'Azure SQL', side: 'business' },
  { id: 's3', name: '3_gold', platform: 'Azure SQL', side: 'business' },
  { id: 's4', name: '4_mart', platform: 'Azure SQL', side: 'business' },
  { id: 's5', name: '5_PBI_Model', platform: 'Power BI', side: 'business' }
];

export interface CreateStoreOptions {
  stages?: Stage[];
  dataTypeMappings?: DataTypeMapping[];
  /** Defaults to the built-in catalog written out for the stages */
  technicalFields?: TechnicalFieldDefinition[];
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function readSheet(workbook: XLSX.WorkBook, name: string, required: boolean): unknown[] {
  const sheet = workbook.Sheets[name];
  if (!sheet) {
    if (required) {
      throw new StoreFormatError(name, 0, 'sheet is missing');
    }
    return [];
  }
  return XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: '' });
}

function appendSheet(workbook: XLSX.WorkBook, name: string, headers: string[], rows: SheetRow[]): void {
  XLSX.utils.book_append_sheet(workbook, XLSX.utils.json_to_sheet(rows, { header: headers }), name);
}

/**
 * Load every table of a workbook into a fresh repository
 */
export function loadRepository(workbook: XLSX.WorkBook): InMemoryPipelineRepository {
  const repository = new InMemoryPipelineRepository();

  parseRows(STORE_TABLES.stages, readSheet(workbook, STORE_TABLES.stages, true), stageRowSchema)
    .forEach(row => repository.setStage(stageFromRow(row)));
  parseRows(STORE_TABLES.artifacts, readSheet(workbook, STORE_TABLES.artifacts, true), artifactRowSchema)
    .forEach(row => repository.setArtifact(artifactFromRow(row)));

  const columnRows = parseRows(STORE_TABLES.columns, readSheet(workbook, STORE_TABLES.columns, true), columnRowSchema);
  const seenIds = new Set<number>();
  columnRows.forEach((row, index) => {
    if (seenIds.has(row.column_id)) {
      throw new StoreFormatError(STORE_TABLES.columns, index + 2, `duplicate column id ${formatColumnId(row.column_id)}`);
    }
    seenIds.add(row.column_id);
  });
  repository.addColumns(columnRows.map(columnFromRow));

  parseRows(
    STORE_TABLES.dataTypeMappings,
    readSheet(workbook, STORE_TABLES.dataTypeMappings, false),
    mappingRowSchema
  ).forEach(row => repository.addDataTypeMapping(mappingFromRow(row)));

  const technicalRows = parseRows(
    STORE_TABLES.technicalColumns,
    readSheet(workbook, STORE_TABLES.technicalColumns, false),
    technicalColumnRowSchema
  );
  if (technicalRows.length > 0) {
    repository.setTechnicalFields(technicalRows.map(technicalFieldFromRow));
  }

  const metadataRows = parseRows(STORE_TABLES.metadata, readSheet(workbook, STORE_TABLES.metadata, false), metadataRowSchema);
  metadataRows.forEach((row, index) => {
    if (row.key !== HIGH_WATER_MARK_KEY) {
      return;
    }
    const value = Number(row.value);
    if (!Number.isInteger(value) || value < 0) {
      throw new StoreFormatError(STORE_TABLES.metadata, index + 2, `"${row.value}" is not a valid high-water mark`);
    }
    if (value > repository.getColumnIdHighWaterMark()) {
      repository.resetColumnIdHighWaterMark(value);
    }
  });

  return repository;
}

/**
 * Build a workbook holding every table of a repository
 */
export function buildWorkbook(repository: IPipelineRepository): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();
  const stages = new Map(repository.getAllStages().map(s => [s.id, s]));
  const artifacts = new Map(repository.getAllArtifacts().map(a => [a.id, a]));

  appendSheet(workbook, STORE_TABLES.stages, STAGE_HEADERS, repository.getAllStages().map(stageToRow));
  appendSheet(workbook, STORE_TABLES.artifacts, ARTIFACT_HEADERS, repository.getAllArtifacts().map(artifactToRow));
  appendSheet(
    workbook,
    STORE_TABLES.columns,
    COLUMN_HEADERS,
    repository.getColumns().map(column => {
      const artifact = artifacts.get(column.artifactId);
      return columnToRow(column, artifact, artifact ? stages.get(artifact.stageId) : undefined);
    })
  );
  appendSheet(
    workbook,
    STORE_TABLES.dataTypeMappings,
    MAPPING_HEADERS,
    repository.getDataTypeMappings().map(mappingToRow)
  );
  appendSheet(
    workbook,
    STORE_TABLES.technicalColumns,
    TECHNICAL_COLUMN_HEADERS,
    repository.getTechnicalFields().map(technicalFieldToRow)
  );
  appendSheet(workbook, STORE_TABLES.metadata, METADATA_HEADERS, [
    { key: HIGH_WATER_MARK_KEY, value: repository.getColumnIdHighWaterMark() }
  ]);
  return workbook;
}

function toBuffer(workbook: XLSX.WorkBook): Buffer {
  return XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
}

export class WorkbookStore {
  private constructor(
    readonly path: string,
    readonly repository: InMemoryPipelineRepository,
    private lock: FileHandle | null
  ) {}

  static lockPath(path: string): string {
    return `${path}.lock`;
  }

  /**
   * Write a new store seeded with stages, type mappings and technical
   * columns. Fails if a file already exists at the path.
   */
  static async create(path: string, options: CreateStoreOptions = {}): Promise<void> {
    const repository = new InMemoryPipelineRepository();
    const stages = options.stages ?? DEFAULT_STAGES;
    stages.forEach(stage => repository.setStage(stage));
    (options.dataTypeMappings ?? defaultTypeMappings()).forEach(mapping => repository.addDataTypeMapping(mapping));
    repository.setTechnicalFields(options.technicalFields ?? defaultTechnicalFields(stages));

    try {
      await writeFile(path, toBuffer(buildWorkbook(repository)), { flag: 'wx' });
    } catch (error) {
      throw new StoreUnavailableError(
        path,
        errorCode(error) === 'EEXIST' ? `Store ${path} already exists` : `Store ${path} could not be created: ${errorMessage(error)}`
      );
    }
  }

  /**
   * Lock and load a store
   */
  static async open(path: string): Promise<WorkbookStore> {
    const lockPath = WorkbookStore.lockPath(path);
    let lock: FileHandle;
    try {
      lock = await open(lockPath, 'wx');
    } catch (error) {
      throw new StoreUnavailableError(
        path,
        errorCode(error) === 'EEXIST'
          ? `Store ${path} is locked by another session`
          : `Store ${path} could not be locked: ${errorMessage(error)}`
      );
    }

    try {
      let data: Buffer;
      try {
        data = await readFile(path);
      } catch (error) {
        throw new StoreUnavailableError(path, `Store ${path} could not be read: ${errorMessage(error)}`);
      }
      const repository = loadRepository(XLSX.read(data, { type: 'buffer' }));
      return new WorkbookStore(path, repository, lock);
    } catch (error) {
      await lock.close();
      await unlink(lockPath);
      throw error;
    }
  }

  get isOpen(): boolean {
    return this.lock !== null;
  }

  /**
   * Write every table back; the file is replaced in one rename
   */
  async save(): Promise<void> {
    if (!this.lock) {
      throw new StoreUnavailableError(this.path, `Store ${this.path} is closed`);
    }
    const tempPath = `${this.path}.tmp`;
    await writeFile(tempPath, toBuffer(buildWorkbook(this.repository)));
    await rename(tempPath, this.path);
  }

  /**
   * Release the lock. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (!this.lock) {
      return;
    }
    const lock = this.lock;
    this.lock = null;
    await lock.close();
    await unlink(WorkbookStore.lockPath(this.path));
  }
}

/**
 * Open a store, run fn against its repository, save and close. The lock is
 * released even when fn throws; nothing is saved in that case.
 */
export async function withWorkbookStore<T>(
  path: string,
  fn: (repository: InMemoryPipelineRepository) => T | Promise<T>
): Promise<T> {
  const store = await WorkbookStore.open(path);
  try {
    const result = await fn(store.repository);
    await store.save();
    return result;
  } finally {
    await store.close();
  }
}
