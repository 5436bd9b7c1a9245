/**
 * Relation Processor
 *
 * Derives the candidate columns an upstream artifact contributes to a target
 * artifact. One strategy per relation kind; no store access and no side
 * effects, so the same inputs always produce the same result.
 */

import { IRelationProcessor } from '../interfaces/services.js';
import {
  ArtifactType,
  CandidateColumn,
  CascadeWarning,
  Column,
  RelationContext,
  RelationKind,
  RelationResult,
  Stage,
  StageTransition,
  TechnicalFieldDefinition,
  isRelationKind
} from '../types/index.js';
import { classifyColumn, isKeyGroup } from './column-groups.js';
import { detectStageLayer, detectTransition as detectStageTransition } from './stage-layers.js';
import { baseDataType } from './type-mapping-table.js';

/**
 * Upstream order given to a technical field of order 0; the engine adds its
 * order offset on top
 */
export const TECHNICAL_FIELD_BASE_ORDER = 900;

const TABLE_NAME = '{table_name}';
const FIELD_NAME = '{field_name}';
const PLACEHOLDER = /\{[a-z_]+\}/i;

const NUMERIC_TYPES = new Set([
  'int',
  'integer',
  'bigint',
  'smallint',
  'tinyint',
  'int64',
  'decimal',
  'numeric',
  'number',
  'float',
  'double',
  'real',
  'money',
  'smallmoney',
  'currency'
]);

const LOOKUP_PRIORITY: Column['group'][] = ['surrogate_key', 'business_key', 'attribute'];

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === '';
}

/**
 * Name a column takes in the target: business-side upstream stages expose
 * their business name when one is set
 */
export function resolveColumnName(column: Pick<Column, 'name' | 'businessName'>, sourceStage: Stage): string {
  if (sourceStage.side === 'business' && !isBlank(column.businessName)) {
    return (column.businessName ?? '').trim();
  }
  return column.name.trim();
}

export function isNumericDataType(dataType: string): boolean {
  return NUMERIC_TYPES.has(baseDataType(dataType).toLowerCase());
}

type RelationStrategy = (upstreamColumns: readonly Column[], context: RelationContext) => Column[];

/**
 * Relation Processor implementation
 */
export class RelationProcessor implements IRelationProcessor {
  private readonly strategies: Record<RelationKind, RelationStrategy> = {
    main: columns => [...columns],
    get_key: columns => columns.filter(c => isKeyGroup(classifyColumn(c))),
    lookup: (columns, context) => selectLookupColumns(columns, context.lookupLimit),
    pbi: columns =>
      columns.filter(c => {
        const group = classifyColumn(c);
        return isKeyGroup(group) || (group === 'attribute' && isNumericDataType(c.dataType));
      })
  };

  process(relationKind: string, upstreamColumns: readonly Column[], context: RelationContext): RelationResult {
    const kind = relationKind.trim().toLowerCase();
    if (!isRelationKind(kind)) {
      return {
        candidates: [],
        technicalFields: [],
        warnings: [
          {
            code: 'unknown_relation_kind',
            artifactId: context.targetArtifactId,
            message: `Unknown relation kind "${relationKind}" for artifact ${context.targetArtifactId}`,
            details: { relationKind }
          }
        ]
      };
    }

    // technical columns move downstream only where their stage says so
    const upstream = upstreamColumns.filter(
      c => classifyColumn(c) !== 'technical' || context.technicalFields.carriesForward(context.sourceStage, c.name)
    );

    const warnings: CascadeWarning[] = [];
    const candidates: CandidateColumn[] = [];
    for (const column of this.strategies[kind](upstream, context)) {
      const candidate = this.toCandidate(column, context, warnings);
      if (candidate) {
        candidates.push(candidate);
      }
    }

    const technicalFields =
      kind !== 'pbi' && context.includeTechnicalFields ? this.technicalFieldsFor(kind, upstream, context, warnings) : [];

    return { candidates, technicalFields, warnings };
  }

  /**
   * Artifact type from an explicit field, falling back to name patterns
   */
  detectArtifactType(name: string, explicitField?: string): ArtifactType {
    const explicit = explicitField?.trim().toLowerCase();
    if (explicit === 'dimension' || explicit === 'fact' || explicit === 'bridge') {
      return explicit;
    }

    const lower = name.trim().toLowerCase();
    if (lower.startsWith('dim') || lower.startsWith('dimension') || lower.startsWith('d_')) {
      return 'dimension';
    }
    if (lower.startsWith('fact') || lower.startsWith('f_') || lower.includes('fact')) {
      return 'fact';
    }
    if (lower.startsWith('bridge') || lower.startsWith('br_') || lower.includes('bridge')) {
      return 'bridge';
    }
    return 'unknown';
  }

  detectTransition(source: string | Stage, target: string | Stage): StageTransition {
    return detectStageTransition(source, target);
  }

  private toCandidate(column: Column, context: RelationContext, warnings: CascadeWarning[]): CandidateColumn | undefined {
    const name = resolveColumnName(column, context.sourceStage);
    if (name === '') {
      warnings.push({
        code: 'blank_column_name',
        artifactId: context.targetArtifactId,
        message: `Column ${column.id} of artifact ${column.artifactId} has no name and was not cascaded`,
        details: { columnId: String(column.id), upstreamArtifactId: column.artifactId }
      });
      return undefined;
    }

    const dataType = this.convertType(column.dataType, name, context, warnings);

    return {
      name,
      businessName: column.businessName,
      dataType,
      group: classifyColumn(column),
      upstreamOrder: column.order,
      comment: column.comment,
      sourceColumnName: column.name,
      lookupFields: column.lookupFields ? [...column.lookupFields] : undefined,
      etlSimpleTransformation: column.etlSimpleTransformation,
      aiTransformationPrompt: column.aiTransformationPrompt,
      etlAiTransformation: column.etlAiTransformation
    };
  }

  private convertType(dataType: string, columnName: string, context: RelationContext, warnings: CascadeWarning[]): string {
    if (context.sourceStage.side !== 'business') {
      return dataType;
    }
    const conversion = context.typeMappings.convert(context.sourceStage.platform, dataType, context.targetStage.platform);
    if (!conversion.mapped) {
      warnings.push({
        code: 'unmapped_data_type',
        artifactId: context.targetArtifactId,
        message: `No mapping for ${dataType} from ${context.sourceStage.platform} to ${context.targetStage.platform}; type kept as is`,
        details: {
          column: columnName,
          dataType,
          sourcePlatform: context.sourceStage.platform,
          targetPlatform: context.targetStage.platform
        }
      });
    }
    return conversion.dataType;
  }

  /**
   * Fields the technical column table gives the target. Plain fields and
   * fields bound to the target come with the main relation only; fields
   * bound to the upstream artifact come with every relation but pbi.
   */
  private technicalFieldsFor(
    kind: RelationKind,
    upstreamColumns: readonly Column[],
    context: RelationContext,
    warnings: CascadeWarning[]
  ): CandidateColumn[] {
    const transition = this.detectTransition(context.sourceStage, context.targetStage);
    const stageName = context.targetStage.name;
    const fields: CandidateColumn[] = [];

    for (const definition of context.technicalFields.fieldsFor(context.targetStage, context.targetArtifactType, transition)) {
      const name = definition.name.split('{stage}').join(stageName);
      const field: CandidateColumn = {
        name,
        dataType: definition.dataType,
        group: definition.group,
        upstreamOrder: TECHNICAL_FIELD_BASE_ORDER + definition.order,
        comment: definition.comment?.split('{stage}').join(stageName)
      };

      if (name.includes(TABLE_NAME)) {
        fields.push(...this.tableNameFields(kind, field, upstreamColumns, context, warnings, definition));
      } else if (name.includes(FIELD_NAME)) {
        fields.push(...this.fieldNameFields(kind, field, upstreamColumns, context, warnings, definition));
      } else if (PLACEHOLDER.test(name)) {
        if (kind === 'main') {
          warnings.push(unresolvedField(definition, context));
        }
      } else if (kind === 'main') {
        fields.push(field);
      }
    }
    return fields;
  }

  /**
   * {table_name}: the target's own name on a dimension; on a fact, one
   * field per upstream dimension, typed from its first business key when
   * the field is a business key reference (_BK)
   */
  private tableNameFields(
    kind: RelationKind,
    field: CandidateColumn,
    upstreamColumns: readonly Column[],
    context: RelationContext,
    warnings: CascadeWarning[],
    definition: TechnicalFieldDefinition
  ): CandidateColumn[] {
    if (context.targetArtifactType === 'dimension') {
      return kind === 'main' ? [{ ...field, name: field.name.split(TABLE_NAME).join(context.targetArtifactName) }] : [];
    }
    if (context.targetArtifactType !== 'fact') {
      if (kind === 'main') {
        warnings.push(unresolvedField(definition, context));
      }
      return [];
    }
    if (context.sourceArtifactType !== 'dimension') {
      return [];
    }

    const name = field.name.split(TABLE_NAME).join(context.sourceArtifactName);
    let dataType = field.dataType;
    if (name.toLowerCase().endsWith('_bk')) {
      const businessKey = upstreamColumns
        .filter(c => classifyColumn(c) === 'business_key')
        .sort((a, b) => a.order - b.order || a.id - b.id)[0];
      if (businessKey) {
        dataType = this.convertType(businessKey.dataType, name, context, warnings);
      }
    }
    return [{ ...field, name, dataType }];
  }

  /**
   * {field_name}: one field per business key of a bronze upstream, for
   * silver targets
   */
  private fieldNameFields(
    kind: RelationKind,
    field: CandidateColumn,
    upstreamColumns: readonly Column[],
    context: RelationContext,
    warnings: CascadeWarning[],
    definition: TechnicalFieldDefinition
  ): CandidateColumn[] {
    if (detectStageLayer(context.targetStage) !== 'silver') {
      if (kind === 'main') {
        warnings.push(unresolvedField(definition, context));
      }
      return [];
    }
    if (detectStageLayer(context.sourceStage) !== 'bronze') {
      return [];
    }

    return upstreamColumns
      .filter(c => classifyColumn(c) === 'business_key' && c.name.trim() !== '')
      .sort((a, b) => a.order - b.order || a.id - b.id)
      .map((column, index) => ({
        ...field,
        name: field.name.split(FIELD_NAME).join(column.name.trim()),
        dataType: this.convertType(column.dataType, column.name, context, warnings),
        upstreamOrder: field.upstreamOrder + index
      }));
  }
}

function unresolvedField(definition: TechnicalFieldDefinition, context: RelationContext): CascadeWarning {
  return {
    code: 'unresolved_technical_field',
    artifactId: context.targetArtifactId,
    message: `Technical field ${definition.name} of stage ${definition.stageId} does not apply to artifact ${context.targetArtifactId}`,
    details: { field: definition.name, stageId: definition.stageId }
  };
}

function selectLookupColumns(columns: readonly Column[], limit: number): Column[] {
  if (limit <= 0) {
    return [];
  }
  const selected: Column[] = [];
  for (const group of LOOKUP_PRIORITY) {
    const inGroup = columns
      .filter(c => classifyColumn(c) === group)
      .sort((a, b) => a.order - b.order || a.id - b.id);
    for (const column of inGroup) {
      if (selected.length >= limit) {
        return selected;
      }
      selected.push(column);
    }
  }
  return selected;
}

