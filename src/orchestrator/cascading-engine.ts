/**
 * Cascading Engine for the column cascading engine
 * Walks the artifact graph and folds the columns of every upstream reference
 * into its target artifact, assigning identity and order on the way.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Artifact,
  ArtifactCascadeResult,
  ArtifactNotFoundError,
  CandidateColumn,
  CascadeRunReport,
  CascadeWarning,
  Column,
  RelationContext,
  StageNotFoundError,
  TechnicalFieldSource,
  TypeLookup,
  isFatalError,
  logError
} from '../types/index.js';
import { ICascadingEngine, IRelationProcessor } from '../interfaces/index.js';
import { IPipelineRepository } from '../repository/pipeline-repository.js';
import { AuditTrailService, createAuditTrailService, getAuditTrailService } from '../services/audit-trail-service.js';
import { CascadeConfig, resolveCascadeConfig } from '../services/cascade-config.js';
import { ColumnIdAllocator } from '../services/column-id-allocator.js';
import { compareColumnsByRank, compareColumnsForDisplay } from '../services/column-groups.js';
import { RelationProcessor } from '../services/relation-processor.js';
import { TechnicalFieldTable } from '../services/technical-field-table.js';
import { TypeMappingTable } from '../services/type-mapping-table.js';
import {
  hasRelationDeclaration,
  hasUpstreamDeclaration,
  isCascadable,
  orderUpstreamFirst,
  parseUpstreamReferences
} from '../services/upstream-references.js';

export interface CascadingEngineOptions {
  config?: Partial<CascadeConfig>;
  auditTrail?: AuditTrailService;
  relationProcessor?: IRelationProcessor;
}

/**
 * State shared by every artifact of one run
 */
interface CascadeRun {
  allocator: ColumnIdAllocator;
  typeMappings: TypeLookup;
  technicalFields: TechnicalFieldSource;
}

/**
 * Running merge state for one target artifact
 */
interface MergeState {
  artifactId: string;
  seenNames: Set<string>;
  nextAttributeOrder: number;
  added: Column[];
  duplicatesSkipped: number;
}

/**
 * Implementation of the Cascading Engine
 */
export class CascadingEngine implements ICascadingEngine {
  private readonly config: CascadeConfig;
  private readonly auditTrail: AuditTrailService;
  private readonly processor: IRelationProcessor;

  constructor(
    private readonly repository: IPipelineRepository,
    options: CascadingEngineOptions = {}
  ) {
    this.config = resolveCascadeConfig(options.config);
    this.auditTrail =
      options.auditTrail ??
      (options.config?.logToConsole !== undefined
        ? createAuditTrailService({ logToConsole: this.config.logToConsole })
        : getAuditTrailService());
    this.processor = options.relationProcessor ?? new RelationProcessor();
  }

  /**
   * Cascade every artifact that declares at least one upstream reference
   */
  cascadeAll(): CascadeRunReport {
    return this.runCascade(this.repository.getAllArtifacts().filter(hasUpstreamDeclaration));
  }

  /**
   * Cascade only artifacts that declare upstream references but have no
   * columns yet
   */
  cascadeMissing(): CascadeRunReport {
    return this.runCascade(
      this.repository
        .getAllArtifacts()
        .filter(a => hasUpstreamDeclaration(a) && this.repository.getColumns(a.id).length === 0)
    );
  }

  /**
   * Drop the columns of every derived artifact and cascade them again,
   * upstream artifacts first. Ids continue above the high-water mark.
   */
  regenerateAll(): CascadeRunReport {
    const artifacts = this.repository.getAllArtifacts().filter(isCascadable);
    const derived = new Set(artifacts.map(a => a.id));
    const columns = this.repository.getColumns();
    const kept = columns.filter(c => !derived.has(c.artifactId));
    this.repository.replaceAllColumns(kept);
    this.auditTrail.logColumnsCleared([...derived], columns.length - kept.length);

    const { ordered, cyclic } = orderUpstreamFirst(artifacts);
    const notes = new Map<string, CascadeWarning[]>();
    for (const artifact of cyclic) {
      notes.set(artifact.id, [
        {
          code: 'dependency_cycle',
          artifactId: artifact.id,
          message: `Artifact ${artifact.id} depends on a cycle of upstream references and was cascaded last`,
          details: { upstreamArtifact: artifact.upstreamArtifact ?? '' }
        }
      ]);
    }
    return this.runCascade([...ordered, ...cyclic], notes);
  }

  cascadeArtifact(targetArtifactId: string): ArtifactCascadeResult {
    const result = this.cascadeOne(targetArtifactId, this.startRun());
    this.auditTrail.logArtifactResult(result);
    return result;
  }

  listColumnsInDisplayOrder(artifactId: string): Column[] {
    if (!this.repository.getArtifact(artifactId)) {
      throw new ArtifactNotFoundError(artifactId);
    }
    return this.repository.getColumns(artifactId).sort(compareColumnsForDisplay);
  }

  private startRun(): CascadeRun {
    return {
      allocator: ColumnIdAllocator.fromRepository(this.repository),
      typeMappings: new TypeMappingTable(this.repository.getDataTypeMappings()),
      technicalFields: TechnicalFieldTable.fromRepository(this.repository)
    };
  }

  /**
   * @param notes - warnings attached to an artifact's result before it is cascaded
   */
  private runCascade(artifacts: Artifact[], notes: ReadonlyMap<string, CascadeWarning[]> = new Map()): CascadeRunReport {
    const runId = uuidv4();
    const startedAt = new Date();
    this.auditTrail.logRunStarted(runId, artifacts.length);

    const run = this.startRun();
    const results: ArtifactCascadeResult[] = [];

    for (const artifact of artifacts) {
      const noted = notes.get(artifact.id) ?? [];
      noted.forEach(warning => this.auditTrail.logWarning(warning));
      let result: ArtifactCascadeResult;
      try {
        result = this.cascadeOne(artifact.id, run);
      } catch (error) {
        if (isFatalError(error)) {
          logError(error, { runId, artifactId: artifact.id });
          this.auditTrail.logRunAborted(runId, error instanceof Error ? error : new Error(String(error)));
          throw error;
        }
        logError(error, { runId, artifactId: artifact.id });
        result = {
          artifactId: artifact.id,
          status: 'failed',
          columnsAdded: 0,
          duplicatesSkipped: 0,
          referencesProcessed: 0,
          referencesSkipped: 0,
          warnings: [],
          error: error instanceof Error ? error.message : String(error)
        };
      }
      if (noted.length > 0) {
        result = { ...result, warnings: [...noted, ...result.warnings] };
      }
      this.auditTrail.logArtifactResult(result);
      results.push(result);
    }

    const report: CascadeRunReport = {
      runId,
      startedAt,
      completedAt: new Date(),
      processed: results.filter(r => r.status === 'cascaded').length,
      skipped: results.filter(r => r.status === 'skipped').length,
      failed: results.filter(r => r.status === 'failed').length,
      columnsAdded: results.reduce((sum, r) => sum + r.columnsAdded, 0),
      results,
      warnings: results.flatMap(r => r.warnings)
    };
    this.auditTrail.logRunCompleted(report);
    return report;
  }

  private cascadeOne(targetArtifactId: string, run: CascadeRun): ArtifactCascadeResult {
    const target = this.repository.getArtifact(targetArtifactId);
    if (!target) {
      throw new ArtifactNotFoundError(targetArtifactId);
    }
    const targetStage = this.repository.getStage(target.stageId);
    if (!targetStage) {
      throw new StageNotFoundError(target.stageId, target.id);
    }
    const references = parseUpstreamReferences(target);
    const targetArtifactType = this.processor.detectArtifactType(target.name, target.artifactType);

    const existing = this.repository.getColumns(target.id);
    const highestAttributeOrder = existing
      .filter(c => c.group === 'attribute')
      .reduce((max, c) => Math.max(max, c.order + 1), 0);
    const state: MergeState = {
      artifactId: target.id,
      seenNames: new Set(existing.map(c => c.name.trim())),
      nextAttributeOrder: Math.max(this.config.attributeOrderStart, highestAttributeOrder),
      added: [],
      duplicatesSkipped: 0
    };

    const warnings: CascadeWarning[] = [];
    if (references.length === 0 && hasUpstreamDeclaration(target) && !hasRelationDeclaration(target)) {
      warnings.push({
        code: 'missing_relation_kind',
        artifactId: target.id,
        message: `Artifact ${target.id} declares upstream artifacts but no relation_type; nothing cascaded`,
        details: { upstreamArtifact: target.upstreamArtifact ?? '' }
      });
    }
    const technicalFields = new Map<string, CandidateColumn>();
    let referencesProcessed = 0;
    let referencesSkipped = 0;

    for (const reference of references) {
      const upstream = this.repository.getArtifact(reference.artifactId);
      if (!upstream) {
        warnings.push({
          code: 'missing_upstream_artifact',
          artifactId: target.id,
          message: `Upstream artifact ${reference.artifactId} of ${target.id} not found`,
          details: { upstreamArtifactId: reference.artifactId }
        });
        referencesSkipped++;
        continue;
      }
      const upstreamStage = this.repository.getStage(upstream.stageId);
      if (!upstreamStage) {
        warnings.push({
          code: 'missing_upstream_stage',
          artifactId: target.id,
          message: `Stage ${upstream.stageId} of upstream artifact ${upstream.id} not found`,
          details: { upstreamArtifactId: upstream.id, stageId: upstream.stageId }
        });
        referencesSkipped++;
        continue;
      }

      const context: RelationContext = {
        targetArtifactId: target.id,
        targetArtifactName: target.name,
        sourceArtifactName: upstream.name,
        sourceArtifactType: this.processor.detectArtifactType(upstream.name, upstream.artifactType),
        targetArtifactType,
        sourceStage: upstreamStage,
        targetStage,
        typeMappings: run.typeMappings,
        technicalFields: run.technicalFields,
        lookupLimit: this.config.lookupLimit,
        includeTechnicalFields: this.config.includeTechnicalFields
      };
      const upstreamColumns = this.repository.getColumns(upstream.id).sort(compareColumnsForDisplay);
      const result = this.processor.process(reference.relationKind, upstreamColumns, context);

      warnings.push(...result.warnings);
      for (const candidate of result.candidates) {
        this.merge(candidate, state, run.allocator);
      }
      // the same field offered by several upstreams counts once
      for (const field of result.technicalFields) {
        const name = field.name.trim();
        if (!technicalFields.has(name)) {
          technicalFields.set(name, field);
        }
      }
      referencesProcessed++;
    }

    for (const field of technicalFields.values()) {
      this.merge(field, state, run.allocator);
    }

    if (state.added.length > 0) {
      this.repository.addColumns(state.added);
    }
    this.repository.reorderColumns(target.id, compareColumnsByRank);
    warnings.forEach(warning => this.auditTrail.logWarning(warning));

    return {
      artifactId: target.id,
      status: referencesProcessed > 0 ? 'cascaded' : 'skipped',
      columnsAdded: state.added.length,
      duplicatesSkipped: state.duplicatesSkipped,
      referencesProcessed,
      referencesSkipped,
      warnings
    };
  }

  /**
   * Add a candidate unless the target already has a column of that name
   */
  private merge(candidate: CandidateColumn, state: MergeState, allocator: ColumnIdAllocator): void {
    const name = candidate.name.trim();
    if (name === '') {
      return;
    }
    if (state.seenNames.has(name)) {
      state.duplicatesSkipped++;
      return;
    }
    state.seenNames.add(name);

    const order =
      candidate.group === 'attribute'
        ? state.nextAttributeOrder++
        : candidate.upstreamOrder + this.config.orderOffset;

    state.added.push({
      id: allocator.next(),
      artifactId: state.artifactId,
      name,
      businessName: candidate.businessName,
      dataType: candidate.dataType,
      order,
      group: candidate.group,
      comment: candidate.comment,
      sourceColumnName: candidate.sourceColumnName,
      lookupFields: candidate.lookupFields,
      etlSimpleTransformation: candidate.etlSimpleTransformation,
      aiTransformationPrompt: candidate.aiTransformationPrompt,
      etlAiTransformation: candidate.etlAiTransformation
    });
  }
}
