/**
 * Pipeline model types: stages, artifacts, columns and type mappings
 */

import { ArtifactType, ColumnGroup, StageSide } from './common.js';

/**
 * A named layer of the pipeline
 */
export interface Stage {
  id: string;
  name: string;
  platform: string;
  side: StageSide;
}

/**
 * Reference from an artifact to one of its upstream artifacts.
 * relationKind is kept as written in the store; unknown kinds are
 * reported by the relation processor rather than rejected on load.
 */
export interface UpstreamReference {
  artifactId: string;
  relationKind: string;
}

/**
 * Table-like entity belonging to a stage
 */
export interface Artifact {
  id: string;
  name: string;
  stageId: string;
  /** Explicit artifact type as entered; blank means infer from the name */
  artifactType?: string;
  /** Upstream artifact ids, comma (or semicolon) separated */
  upstreamArtifact?: string;
  /** One relation kind for all upstream ids, or one per id */
  relationType?: string;
}

/**
 * Column of an artifact
 */
export interface Column {
  id: number;
  artifactId: string;
  name: string;
  businessName?: string;
  dataType: string;
  order: number;
  group: ColumnGroup;
  comment?: string;
  sourceColumnName?: string;
  lookupFields?: string[];
  etlSimpleTransformation?: string;
  aiTransformationPrompt?: string;
  etlAiTransformation?: string;
}

/**
 * Entry of the type mapping table
 */
export interface DataTypeMapping {
  sourcePlatform: string;
  sourceDataType: string;
  targetPlatform: string;
  targetDataType: string;
}

/**
 * Row of the technical column table: a field injected into every artifact of
 * a stage. Names may hold "{stage}", "{table_name}" and "{field_name}".
 */
export interface TechnicalFieldDefinition {
  stageId: string;
  name: string;
  dataType: string;
  group: ColumnGroup;
  order: number;
  /** Whether downstream artifacts keep the column when it reaches them */
  carryForward: boolean;
  /** Limits the field to one artifact kind; undefined means every kind */
  artifactType?: ArtifactType;
  comment?: string;
}
