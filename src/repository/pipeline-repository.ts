/**
 * Pipeline Repository for the column cascading engine
 * Provides centralized storage and CRUD operations for stages, artifacts,
 * columns, data type mappings and technical column definitions, with an
 * audit log of every mutation
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Artifact,
  AuditEntry,
  CascadeError,
  Column,
  CreateAuditEntryParams,
  DataTypeMapping,
  ErrorCategory,
  Stage,
  TechnicalFieldDefinition
} from '../types/index.js';

/**
 * Interface for the Pipeline Repository
 */
export interface IPipelineRepository {
  // Stages
  getStage(stageId: string): Stage | undefined;
  getAllStages(): Stage[];
  setStage(stage: Stage): void;

  // Artifacts (store order is insertion order)
  getArtifact(artifactId: string): Artifact | undefined;
  getAllArtifacts(): Artifact[];
  setArtifact(artifact: Artifact): void;
  deleteArtifact(artifactId: string): boolean;

  // Columns (store order is insertion order)
  getColumn(columnId: number): Column | undefined;
  getColumns(artifactId?: string): Column[];
  createColumn(column: Omit<Column, 'id'>): Column;
  addColumns(columns: Column[]): void;
  replaceAllColumns(columns: Column[]): void;
  /** Stable reorder of one artifact's columns within the slots they hold */
  reorderColumns(artifactId: string, compare: (a: Column, b: Column) => number): boolean;
  deleteColumn(columnId: number): boolean;
  getColumnIdHighWaterMark(): number;
  resetColumnIdHighWaterMark(value: number): void;

  // Data type mappings
  getDataTypeMappings(): DataTypeMapping[];
  addDataTypeMapping(mapping: DataTypeMapping): void;

  // Technical column table
  getTechnicalFields(): TechnicalFieldDefinition[];
  setTechnicalFields(definitions: TechnicalFieldDefinition[]): void;

  // Audit Log
  getAuditEntries(entityType?: string, entityId?: string): AuditEntry[];
  createAuditEntry(params: CreateAuditEntryParams): AuditEntry;
}

/**
 * In-memory implementation of the Pipeline Repository
 */
export class InMemoryPipelineRepository implements IPipelineRepository {
  private stages: Map<string, Stage> = new Map();
  private artifacts: Map<string, Artifact> = new Map();
  private columns: Column[] = [];
  private columnIds: Set<number> = new Set();
  private columnIdHighWaterMark = 0;
  private dataTypeMappings: DataTypeMapping[] = [];
  private technicalFields: TechnicalFieldDefinition[] = [];
  private auditLog: AuditEntry[] = [];

  // Stages
  getStage(stageId: string): Stage | undefined {
    return this.stages.get(stageId);
  }

  getAllStages(): Stage[] {
    return Array.from(this.stages.values());
  }

  setStage(stage: Stage): void {
    const previousState = this.stages.get(stage.id);
    if (previousState && !sameStage(previousState, stage) && this.isStageReferenced(stage.id)) {
      throw new CascadeError(
        `Stage ${stage.id} is referenced by artifacts and cannot be changed`,
        ErrorCategory.CONFIGURATION,
        'ERR_STAGE_IMMUTABLE'
      );
    }
    this.stages.set(stage.id, stage);
    this.createAuditEntry({
      actor: 'system',
      actorType: 'system',
      action: previousState ? 'update' : 'create',
      entityType: 'Stage',
      entityId: stage.id,
      previousState,
      newState: stage
    });
  }

  // Artifacts
  getArtifact(artifactId: string): Artifact | undefined {
    return this.artifacts.get(artifactId);
  }

  getAllArtifacts(): Artifact[] {
    return Array.from(this.artifacts.values());
  }

  setArtifact(artifact: Artifact): void {
    const previousState = this.artifacts.get(artifact.id);
    this.artifacts.set(artifact.id, artifact);
    this.createAuditEntry({
      actor: 'system',
      actorType: 'system',
      action: previousState ? 'update' : 'create',
      entityType: 'Artifact',
      entityId: artifact.id,
      previousState,
      newState: artifact
    });
  }

  deleteArtifact(artifactId: string): boolean {
    const existing = this.artifacts.get(artifactId);
    if (existing) {
      this.artifacts.delete(artifactId);
      const removed = this.columns.filter(c => c.artifactId === artifactId);
      this.columns = this.columns.filter(c => c.artifactId !== artifactId);
      removed.forEach(c => this.columnIds.delete(c.id));
      this.createAuditEntry({
        actor: 'system',
        actorType: 'system',
        action: 'delete',
        entityType: 'Artifact',
        entityId: artifactId,
        previousState: existing,
        rationale: `${removed.length} column(s) removed with the artifact`
      });
      return true;
    }
    return false;
  }

  // Columns
  getColumn(columnId: number): Column | undefined {
    return this.columns.find(c => c.id === columnId);
  }

  getColumns(artifactId?: string): Column[] {
    if (artifactId !== undefined) {
      return this.columns.filter(c => c.artifactId === artifactId);
    }
    return [...this.columns];
  }

  createColumn(column: Omit<Column, 'id'>): Column {
    const newColumn: Column = {
      ...column,
      id: this.columnIdHighWaterMark + 1
    };
    this.addColumns([newColumn]);
    return newColumn;
  }

  addColumns(columns: Column[]): void {
    const batchIds = new Set<number>();
    for (const column of columns) {
      assertValidColumn(column);
      if (this.columnIds.has(column.id) || batchIds.has(column.id)) {
        throw new CascadeError(
          `Column id ${column.id} is already in use`,
          ErrorCategory.DATA,
          'ERR_DUPLICATE_COLUMN_ID'
        );
      }
      batchIds.add(column.id);
    }

    for (const column of columns) {
      this.columns.push(column);
      this.columnIds.add(column.id);
      this.columnIdHighWaterMark = Math.max(this.columnIdHighWaterMark, column.id);
    }

    const byArtifact = new Map<string, number[]>();
    for (const column of columns) {
      const ids = byArtifact.get(column.artifactId) || [];
      ids.push(column.id);
      byArtifact.set(column.artifactId, ids);
    }
    byArtifact.forEach((ids, artifactId) => {
      this.createAuditEntry({
        actor: 'system',
        actorType: 'system',
        action: 'add_columns',
        entityType: 'Artifact',
        entityId: artifactId,
        newState: { columnIds: ids }
      });
    });
  }

  replaceAllColumns(columns: Column[]): void {
    const ids = new Set<number>();
    for (const column of columns) {
      assertValidColumn(column);
      if (ids.has(column.id)) {
        throw new CascadeError(
          `Column id ${column.id} appears more than once`,
          ErrorCategory.DATA,
          'ERR_DUPLICATE_COLUMN_ID'
        );
      }
      ids.add(column.id);
    }

    const previousCount = this.columns.length;
    this.columns = [...columns];
    this.columnIds = ids;
    for (const id of ids) {
      this.columnIdHighWaterMark = Math.max(this.columnIdHighWaterMark, id);
    }
    this.createAuditEntry({
      actor: 'system',
      actorType: 'system',
      action: 'replace_columns',
      entityType: 'ColumnStore',
      entityId: 'columns',
      previousState: { count: previousCount },
      newState: { count: columns.length }
    });
  }

  reorderColumns(artifactId: string, compare: (a: Column, b: Column) => number): boolean {
    const slots: number[] = [];
    this.columns.forEach((column, index) => {
      if (column.artifactId === artifactId) {
        slots.push(index);
      }
    });
    const current = slots.map(index => this.columns[index]);
    const sorted = [...current].sort(compare);
    if (sorted.every((column, index) => column === current[index])) {
      return false;
    }

    slots.forEach((slot, index) => {
      this.columns[slot] = sorted[index];
    });
    this.createAuditEntry({
      actor: 'system',
      actorType: 'system',
      action: 'reorder_columns',
      entityType: 'Artifact',
      entityId: artifactId,
      previousState: { columnIds: current.map(c => c.id) },
      newState: { columnIds: sorted.map(c => c.id) }
    });
    return true;
  }

  deleteColumn(columnId: number): boolean {
    const existing = this.getColumn(columnId);
    if (existing) {
      this.columns = this.columns.filter(c => c.id !== columnId);
      this.columnIds.delete(columnId);
      this.createAuditEntry({
        actor: 'system',
        actorType: 'system',
        action: 'delete',
        entityType: 'Column',
        entityId: String(columnId),
        previousState: existing
      });
      return true;
    }
    return false;
  }

  getColumnIdHighWaterMark(): number {
    return this.columnIdHighWaterMark;
  }

  resetColumnIdHighWaterMark(value: number): void {
    const maxInUse = this.columns.reduce((max, c) => Math.max(max, c.id), 0);
    if (value < maxInUse) {
      throw new CascadeError(
        `High-water mark ${value} is below the largest column id in use (${maxInUse})`,
        ErrorCategory.DATA,
        'ERR_HIGH_WATER_MARK'
      );
    }
    const previousState = this.columnIdHighWaterMark;
    this.columnIdHighWaterMark = value;
    this.createAuditEntry({
      actor: 'system',
      actorType: 'system',
      action: 'reset_high_water_mark',
      entityType: 'ColumnStore',
      entityId: 'columns',
      previousState,
      newState: value
    });
  }

  // Data type mappings
  getDataTypeMappings(): DataTypeMapping[] {
    return [...this.dataTypeMappings];
  }

  addDataTypeMapping(mapping: DataTypeMapping): void {
    this.dataTypeMappings.push(mapping);
  }

  // Technical column table
  getTechnicalFields(): TechnicalFieldDefinition[] {
    return this.technicalFields.map(definition => ({ ...definition }));
  }

  setTechnicalFields(definitions: TechnicalFieldDefinition[]): void {
    const previousCount = this.technicalFields.length;
    this.technicalFields = definitions.map(definition => ({ ...definition }));
    this.createAuditEntry({
      actor: 'system',
      actorType: 'system',
      action: 'replace_technical_fields',
      entityType: 'TechnicalFieldTable',
      entityId: 'technical_columns',
      previousState: { count: previousCount },
      newState: { count: definitions.length }
    });
  }

  // Audit Log
  getAuditEntries(entityType?: string, entityId?: string): AuditEntry[] {
    let entries = this.auditLog;
    if (entityType) {
      entries = entries.filter(e => e.entityType === entityType);
    }
    if (entityId) {
      entries = entries.filter(e => e.entityId === entityId);
    }
    return entries;
  }

  createAuditEntry(params: CreateAuditEntryParams): AuditEntry {
    const entry: AuditEntry = {
      id: uuidv4(),
      timestamp: new Date(),
      ...params
    };
    this.auditLog.push(entry);
    return entry;
  }

  private isStageReferenced(stageId: string): boolean {
    return Array.from(this.artifacts.values()).some(a => a.stageId === stageId);
  }
}

function sameStage(a: Stage, b: Stage): boolean {
  return a.name === b.name && a.platform === b.platform && a.side === b.side;
}

function assertValidColumn(column: Column): void {
  if (!Number.isInteger(column.id) || column.id < 1) {
    throw new CascadeError(
      `Column id ${column.id} must be a positive integer`,
      ErrorCategory.DATA,
      'ERR_INVALID_COLUMN_ID'
    );
  }
  if (column.name.trim() === '') {
    throw new CascadeError(
      `Column ${column.id} of artifact ${column.artifactId} has a blank name`,
      ErrorCategory.DATA,
      'ERR_BLANK_COLUMN_NAME'
    );
  }
}
