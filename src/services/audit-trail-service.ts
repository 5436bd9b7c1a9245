/**
 * Audit Trail Service for the column cascading engine
 *
 * Records every cascade and maintenance action as an audit entry and echoes
 * it to the console when enabled:
 * - Cascade runs and per-artifact outcomes
 * - Warnings raised while deriving columns
 * - Cleanup passes over the column store
 */

import { v4 as uuidv4 } from 'uuid';
import { AuditEntry, CreateAuditEntryParams } from '../types/audit.js';
import { ActorType } from '../types/common.js';
import {
  ArtifactCascadeResult,
  CascadeRunReport,
  CascadeWarning,
  DuplicateCleanupResult,
  ReenumerationResult
} from '../types/cascade.js';
import { loadCascadeConfig } from './cascade-config.js';

// ==================== Types ====================

/**
 * Audit action types for cascading
 */
export type CascadeAuditAction =
  | 'cascade_run_started'
  | 'cascade_run_completed'
  | 'cascade_run_aborted'
  | 'artifact_cascaded'
  | 'artifact_skipped'
  | 'artifact_failed'
  | 'cascade_warning'
  | 'columns_cleared'
  | 'duplicates_removed'
  | 'ids_reenumerated';

/**
 * Configuration for the audit trail service
 */
export interface AuditTrailServiceConfig {
  /** Whether to enable audit logging */
  enabled: boolean;
  /** Whether to log to console (for debugging) */
  logToConsole: boolean;
  /** Maximum entries to keep in memory */
  maxInMemoryEntries: number;
}

// ==================== Default Configuration ====================

const DEFAULT_CONFIG: Omit<AuditTrailServiceConfig, 'logToConsole'> = {
  enabled: true,
  maxInMemoryEntries: 10000,
};

// ==================== Actor Type Constants ====================

const ACTOR_ENGINE: ActorType = 'engine';
const ACTOR_OPERATOR: ActorType = 'operator';

const ENGINE_ACTOR = 'cascading-engine';
const CLEANUP_ACTOR = 'cleanup-service';

// ==================== Audit Trail Service ====================

export class AuditTrailService {
  private config: AuditTrailServiceConfig;
  private entries: AuditEntry[] = [];

  constructor(config: Partial<AuditTrailServiceConfig> = {}) {
    this.config = {
      ...DEFAULT_CONFIG,
      logToConsole: config.logToConsole ?? loadCascadeConfig().logToConsole,
      ...config,
    };
  }

  // ==================== Core Audit Methods ====================

  /**
   * Create an audit entry
   */
  createAuditEntry(params: CreateAuditEntryParams): AuditEntry {
    const entry: AuditEntry = {
      id: uuidv4(),
      timestamp: new Date(),
      ...params,
    };

    if (this.config.enabled) {
      this.entries.push(entry);

      if (this.entries.length > this.config.maxInMemoryEntries) {
        this.entries = this.entries.slice(-this.config.maxInMemoryEntries);
      }

      if (this.config.logToConsole) {
        console.log('[CASCADE]', `${entry.action} ${entry.entityType}:${entry.entityId}`, entry.rationale ?? '');
      }
    }

    return entry;
  }

  logRunStarted(runId: string, artifactCount: number): AuditEntry {
    return this.createAuditEntry({
      actor: ENGINE_ACTOR,
      actorType: ACTOR_ENGINE,
      action: 'cascade_run_started',
      entityType: 'CascadeRun',
      entityId: runId,
      newState: { artifactCount },
      rationale: `Cascading ${artifactCount} artifact(s)`,
    });
  }

  logRunCompleted(report: CascadeRunReport): AuditEntry {
    return this.createAuditEntry({
      actor: ENGINE_ACTOR,
      actorType: ACTOR_ENGINE,
      action: 'cascade_run_completed',
      entityType: 'CascadeRun',
      entityId: report.runId,
      newState: {
        processed: report.processed,
        skipped: report.skipped,
        failed: report.failed,
        columnsAdded: report.columnsAdded,
        warnings: report.warnings.length,
      },
      rationale: `${report.processed} cascaded, ${report.skipped} skipped, ${report.failed} failed`,
    });
  }

  logRunAborted(runId: string, error: Error): AuditEntry {
    return this.createAuditEntry({
      actor: ENGINE_ACTOR,
      actorType: ACTOR_ENGINE,
      action: 'cascade_run_aborted',
      entityType: 'CascadeRun',
      entityId: runId,
      newState: { errorName: error.name, errorMessage: error.message },
      rationale: `Run aborted: ${error.message}`,
    });
  }

  /**
   * Log the outcome of one artifact; failed artifacts carry their error text
   */
  logArtifactResult(result: ArtifactCascadeResult): AuditEntry {
    const action: CascadeAuditAction =
      result.status === 'cascaded'
        ? 'artifact_cascaded'
        : result.status === 'skipped'
          ? 'artifact_skipped'
          : 'artifact_failed';
    return this.createAuditEntry({
      actor: ENGINE_ACTOR,
      actorType: ACTOR_ENGINE,
      action,
      entityType: 'Artifact',
      entityId: result.artifactId,
      newState: {
        columnsAdded: result.columnsAdded,
        duplicatesSkipped: result.duplicatesSkipped,
        referencesProcessed: result.referencesProcessed,
        referencesSkipped: result.referencesSkipped,
      },
      rationale: result.error ?? `${result.columnsAdded} column(s) added`,
    });
  }

  logWarning(warning: CascadeWarning): AuditEntry {
    if (this.config.logToConsole) {
      console.warn('[CASCADE]', `${warning.code}: ${warning.message}`);
    }
    return this.createAuditEntry({
      actor: ENGINE_ACTOR,
      actorType: ACTOR_ENGINE,
      action: 'cascade_warning',
      entityType: 'Artifact',
      entityId: warning.artifactId,
      newState: { code: warning.code, details: warning.details },
      rationale: warning.message,
    });
  }

  /**
   * Log the columns dropped ahead of a full regeneration
   */
  logColumnsCleared(artifactIds: string[], removed: number): AuditEntry {
    return this.createAuditEntry({
      actor: ENGINE_ACTOR,
      actorType: ACTOR_ENGINE,
      action: 'columns_cleared',
      entityType: 'ColumnStore',
      entityId: 'columns',
      newState: { artifactIds, removed },
      rationale: `${removed} column(s) of ${artifactIds.length} derived artifact(s) cleared`,
    });
  }

  logDuplicatesRemoved(result: DuplicateCleanupResult): AuditEntry {
    return this.createAuditEntry({
      actor: CLEANUP_ACTOR,
      actorType: ACTOR_OPERATOR,
      action: 'duplicates_removed',
      entityType: 'ColumnStore',
      entityId: 'columns',
      newState: result,
      rationale: `${result.removed} duplicate column(s) removed`,
    });
  }

  logIdsReenumerated(result: ReenumerationResult): AuditEntry {
    return this.createAuditEntry({
      actor: CLEANUP_ACTOR,
      actorType: ACTOR_OPERATOR,
      action: 'ids_reenumerated',
      entityType: 'ColumnStore',
      entityId: 'columns',
      newState: result,
      rationale: `${result.total} column id(s) re-enumerated, ${result.remapped} changed`,
    });
  }

  // ==================== Query Methods ====================

  /**
   * Get audit entries for an artifact
   */
  getEntriesForArtifact(artifactId: string): AuditEntry[] {
    return this.entries.filter(
      entry => entry.entityType === 'Artifact' && entry.entityId === artifactId
    );
  }

  /**
   * Get audit entries by action type
   */
  getEntriesByAction(action: CascadeAuditAction): AuditEntry[] {
    return this.entries.filter(entry => entry.action === action);
  }

  getEntriesInRange(startDate: Date, endDate: Date): AuditEntry[] {
    return this.entries.filter(
      entry => entry.timestamp >= startDate && entry.timestamp <= endDate
    );
  }

  getAllEntries(): AuditEntry[] {
    return [...this.entries];
  }

  /**
   * Clear all entries (for testing)
   */
  clear(): void {
    this.entries = [];
  }
}

// ==================== Factory Functions ====================

export function createAuditTrailService(
  config?: Partial<AuditTrailServiceConfig>
): AuditTrailService {
  return new AuditTrailService(config);
}

// ==================== Singleton Instance ====================

let defaultService: AuditTrailService | null = null;

/**
 * Get the default Audit Trail Service
 */
export function getAuditTrailService(): AuditTrailService {
  if (!defaultService) {
    defaultService = createAuditTrailService();
  }
  return defaultService;
}

/**
 * Set the default Audit Trail Service
 */
export function setAuditTrailService(service: AuditTrailService): void {
  defaultService = service;
}
