/**
 * Row schemas of the persisted store tables and their mapping to the
 * domain model. Every row read from a store goes through these schemas.
 */

import { z } from 'zod';
import { normalizeColumnGroup } from '../services/column-groups.js';
import {
  Artifact,
  Column,
  DataTypeMapping,
  Stage,
  StoreFormatError,
  TechnicalFieldDefinition
} from '../types/index.js';

export const STORE_TABLES = {
  stages: 'stages',
  artifacts: 'artifacts',
  columns: 'columns',
  dataTypeMappings: 'data_type_mappings',
  technicalColumns: 'technical_columns',
  metadata: 'store_metadata'
} as const;

export const HIGH_WATER_MARK_KEY = 'column_id_high_water_mark';

export const STAGE_HEADERS = ['stage_id', 'stage_name', 'platform', 'side'];
export const ARTIFACT_HEADERS = [
  'artifact_id',
  'artifact_name',
  'stage_id',
  'artifact_type',
  'upstream_artifact',
  'relation_type'
];
export const COLUMN_HEADERS = [
  'stage_id',
  'stage_name',
  'artifact_id',
  'artifact_name',
  'column_id',
  'column_name',
  'order',
  'data_type',
  'column_comment',
  'column_business_name',
  'column_group',
  'source_column_name',
  'lookup_fields',
  'etl_simple_transformation',
  'ai_transformation_prompt',
  'etl_ai_transformation'
];
export const MAPPING_HEADERS = ['source_platform', 'source_data_type', 'target_platform', 'target_data_type'];
export const TECHNICAL_COLUMN_HEADERS = [
  'stage_id',
  'column_name',
  'data_type',
  'column_group',
  'order',
  'take_to_next_level',
  'artifact_type',
  'column_comment'
];
export const METADATA_HEADERS = ['key', 'value'];

// ==================== Cell Schemas ====================

const cell = z
  .union([z.string(), z.number(), z.boolean()])
  .optional()
  .transform(value => (value === undefined ? '' : String(value).trim()));

const requiredText = cell.refine(value => value !== '', { message: 'must not be blank' });

const optionalText = cell.transform(value => (value === '' ? undefined : value));

const COLUMN_ID_PATTERN = /^(?:c_)?(\d+)$/i;

export function parseColumnId(value: string): number | undefined {
  const match = COLUMN_ID_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const id = Number(match[1]);
  return id > 0 ? id : undefined;
}

export function formatColumnId(id: number): string {
  return `c_${id}`;
}

const columnId = cell.transform((value, ctx) => {
  const id = parseColumnId(value);
  if (id === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a column id` });
    return z.NEVER;
  }
  return id;
});

const integer = cell.transform((value, ctx) => {
  if (value === '') {
    return 0;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not an integer` });
    return z.NEVER;
  }
  return parsed;
});

const listText = cell.transform(value =>
  value === ''
    ? undefined
    : value
        .split(',')
        .map(part => part.trim())
        .filter(part => part !== '')
);

const TRUE_FLAGS = new Set(['1', 'true', 'yes', 'y']);
const FALSE_FLAGS = new Set(['0', 'false', 'no', 'n']);

// blank means yes
const flag = cell.transform((value, ctx) => {
  const lower = value.toLowerCase();
  if (lower === '' || TRUE_FLAGS.has(lower)) {
    return true;
  }
  if (FALSE_FLAGS.has(lower)) {
    return false;
  }
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${value}" is not a yes/no value` });
  return z.NEVER;
});

// ==================== Row Schemas ====================

export const stageRowSchema = z.object({
  stage_id: requiredText,
  stage_name: requiredText,
  platform: cell,
  side: cell.transform(value => value.toLowerCase()).pipe(z.enum(['source', 'business']))
});

export const artifactRowSchema = z.object({
  artifact_id: requiredText,
  artifact_name: requiredText,
  stage_id: requiredText,
  artifact_type: optionalText,
  upstream_artifact: optionalText,
  relation_type: optionalText
});

export const columnRowSchema = z.object({
  stage_id: optionalText,
  stage_name: optionalText,
  artifact_id: requiredText,
  artifact_name: optionalText,
  column_id: columnId,
  column_name: requiredText,
  order: integer,
  data_type: cell,
  column_comment: optionalText,
  column_business_name: optionalText,
  column_group: cell.transform(value => normalizeColumnGroup(value)),
  source_column_name: optionalText,
  lookup_fields: listText,
  etl_simple_transformation: optionalText,
  ai_transformation_prompt: optionalText,
  etl_ai_transformation: optionalText
});

export const mappingRowSchema = z.object({
  source_platform: requiredText,
  source_data_type: requiredText,
  target_platform: requiredText,
  target_data_type: requiredText
});

export const technicalColumnRowSchema = z.object({
  stage_id: requiredText,
  column_name: requiredText,
  data_type: cell,
  column_group: cell.transform(value => (value === '' ? 'technical' : normalizeColumnGroup(value))),
  order: integer,
  take_to_next_level: flag,
  artifact_type: cell
    .transform(value => value.toLowerCase())
    .pipe(z.enum(['', 'all', 'dimension', 'fact', 'bridge', 'unknown']))
    .transform(value => (value === '' || value === 'all' ? undefined : value)),
  column_comment: optionalText
});

export const metadataRowSchema = z.object({
  key: requiredText,
  value: cell
});

export type StageRow = z.infer<typeof stageRowSchema>;
export type ArtifactRow = z.infer<typeof artifactRowSchema>;
export type ColumnRow = z.infer<typeof columnRowSchema>;
export type MappingRow = z.infer<typeof mappingRowSchema>;
export type TechnicalColumnRow = z.infer<typeof technicalColumnRowSchema>;
export type MetadataRow = z.infer<typeof metadataRowSchema>;

export type SheetRow = Record<string, string | number>;

/**
 * Validate the rows of one table. Row numbers in errors count the header
 * row, as a spreadsheet shows them.
 */
export function parseRows<S extends z.ZodTypeAny>(table: string, rows: readonly unknown[], schema: S): z.output<S>[] {
  return rows.map((row, index) => {
    const result = schema.safeParse(row);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new StoreFormatError(table, index + 2, issues);
    }
    return result.data;
  });
}

// ==================== Row -> Domain ====================

export function stageFromRow(row: StageRow): Stage {
  return { id: row.stage_id, name: row.stage_name, platform: row.platform, side: row.side };
}

export function artifactFromRow(row: ArtifactRow): Artifact {
  return {
    id: row.artifact_id,
    name: row.artifact_name,
    stageId: row.stage_id,
    artifactType: row.artifact_type,
    upstreamArtifact: row.upstream_artifact,
    relationType: row.relation_type
  };
}

export function columnFromRow(row: ColumnRow): Column {
  return {
    id: row.column_id,
    artifactId: row.artifact_id,
    name: row.column_name,
    businessName: row.column_business_name,
    dataType: row.data_type,
    order: row.order,
    group: row.column_group,
    comment: row.column_comment,
    sourceColumnName: row.source_column_name,
    lookupFields: row.lookup_fields,
    etlSimpleTransformation: row.etl_simple_transformation,
    aiTransformationPrompt: row.ai_transformation_prompt,
    etlAiTransformation: row.etl_ai_transformation
  };
}

export function mappingFromRow(row: MappingRow): DataTypeMapping {
  return {
    sourcePlatform: row.source_platform,
    sourceDataType: row.source_data_type,
    targetPlatform: row.target_platform,
    targetDataType: row.target_data_type
  };
}

export function technicalFieldFromRow(row: TechnicalColumnRow): TechnicalFieldDefinition {
  return {
    stageId: row.stage_id,
    name: row.column_name,
    dataType: row.data_type,
    group: row.column_group,
    order: row.order,
    carryForward: row.take_to_next_level,
    artifactType: row.artifact_type,
    comment: row.column_comment
  };
}

// ==================== Domain -> Row ====================

export function stageToRow(stage: Stage): SheetRow {
  return { stage_id: stage.id, stage_name: stage.name, platform: stage.platform, side: stage.side };
}

export function artifactToRow(artifact: Artifact): SheetRow {
  return {
    artifact_id: artifact.id,
    artifact_name: artifact.name,
    stage_id: artifact.stageId,
    artifact_type: artifact.artifactType ?? '',
    upstream_artifact: artifact.upstreamArtifact ?? '',
    relation_type: artifact.relationType ?? ''
  };
}

/**
 * Column row with the denormalised stage and artifact names filled in
 */
export function columnToRow(column: Column, artifact?: Artifact, stage?: Stage): SheetRow {
  return {
    stage_id: stage?.id ?? artifact?.stageId ?? '',
    stage_name: stage?.name ?? '',
    artifact_id: column.artifactId,
    artifact_name: artifact?.name ?? '',
    column_id: formatColumnId(column.id),
    column_name: column.name,
    order: column.order,
    data_type: column.dataType,
    column_comment: column.comment ?? '',
    column_business_name: column.businessName ?? '',
    column_group: column.group,
    source_column_name: column.sourceColumnName ?? '',
    lookup_fields: column.lookupFields ? column.lookupFields.join(',') : '',
    etl_simple_transformation: column.etlSimpleTransformation ?? '',
    ai_transformation_prompt: column.aiTransformationPrompt ?? '',
    etl_ai_transformation: column.etlAiTransformation ?? ''
  };
}

export function mappingToRow(mapping: DataTypeMapping): SheetRow {
  return {
    source_platform: mapping.sourcePlatform,
    source_data_type: mapping.sourceDataType,
    target_platform: mapping.targetPlatform,
    target_data_type: mapping.targetDataType
  };
}

export function technicalFieldToRow(definition: TechnicalFieldDefinition): SheetRow {
  return {
    stage_id: definition.stageId,
    column_name: definition.name,
    data_type: definition.dataType,
    column_group: definition.group,
    order: definition.order,
    take_to_next_level: definition.carryForward ? 1 : 0,
    artifact_type: definition.artifactType ?? 'all',
    column_comment: definition.comment ?? ''
  };
}
