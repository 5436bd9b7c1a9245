/**
 * Common types and enums used across the column cascading engine
 */

// Stage side: raw source-oriented naming vs business-facing naming
export type StageSide = 'source' | 'business';

// Pipeline layers, in flow order
export type StageLayer = 'landing' | 'bronze' | 'silver' | 'gold' | 'mart' | 'semantic_model';

// Artifact kinds
export type ArtifactType = 'dimension' | 'fact' | 'bridge' | 'unknown';

// Relation kinds between an artifact and one of its upstream artifacts
export type RelationKind = 'main' | 'get_key' | 'lookup' | 'pbi';

export const RELATION_KINDS: readonly RelationKind[] = ['main', 'get_key', 'lookup', 'pbi'];

// Column group classification
export type ColumnGroup =
  | 'surrogate_key'
  | 'business_key'
  | 'attribute'
  | 'technical'
  | 'unclassified';

// Known stage transitions
export type StageTransition =
  | 'landing_to_bronze'
  | 'bronze_to_silver'
  | 'silver_to_gold'
  | 'gold_to_mart'
  | 'mart_to_semantic_model'
  | 'unspecified';

// Actor types for audit entries
export type ActorType = 'operator' | 'engine' | 'system';

// Per-artifact cascade outcome
export type CascadeStatus = 'cascaded' | 'skipped' | 'failed';

// Warning codes raised during cascading
export type CascadeWarningCode =
  | 'missing_upstream_artifact'
  | 'missing_upstream_stage'
  | 'unmapped_data_type'
  | 'unknown_relation_kind'
  | 'blank_column_name'
  | 'missing_relation_kind'
  | 'unresolved_technical_field'
  | 'dependency_cycle';

export function isRelationKind(value: string): value is RelationKind {
  return RELATION_KINDS.some(kind => kind === value);
}
