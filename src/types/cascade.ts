/**
 * Cascade types: relation processing inputs/outputs and run reports
 */

import {
  ArtifactType,
  CascadeStatus,
  CascadeWarningCode,
  ColumnGroup,
  StageTransition
} from './common.js';
import { Stage, TechnicalFieldDefinition } from './pipeline.js';

/**
 * Result of converting a data type between platforms
 */
export interface TypeConversion {
  dataType: string;
  /** False when no mapping entry matched and the type passed through */
  mapped: boolean;
}

/**
 * Read-only view of the type mapping table
 */
export interface TypeLookup {
  convert(sourcePlatform: string, sourceType: string, targetPlatform: string): TypeConversion;
}

/**
 * Read-only view of the technical column table
 */
export interface TechnicalFieldSource {
  fieldsFor(targetStage: Stage, targetArtifactType: ArtifactType, transition: StageTransition): TechnicalFieldDefinition[];
  carriesForward(stage: Stage, columnName: string): boolean;
}

/**
 * Graph context handed to the relation processor
 */
export interface RelationContext {
  targetArtifactId: string;
  targetArtifactName: string;
  sourceArtifactName: string;
  sourceArtifactType: ArtifactType;
  targetArtifactType: ArtifactType;
  sourceStage: Stage;
  targetStage: Stage;
  typeMappings: TypeLookup;
  technicalFields: TechnicalFieldSource;
  lookupLimit: number;
  includeTechnicalFields: boolean;
}

/**
 * Column proposed for the target artifact, before identity and order
 * are assigned by the engine
 */
export interface CandidateColumn {
  name: string;
  businessName?: string;
  dataType: string;
  group: ColumnGroup;
  upstreamOrder: number;
  comment?: string;
  sourceColumnName?: string;
  lookupFields?: string[];
  etlSimpleTransformation?: string;
  aiTransformationPrompt?: string;
  etlAiTransformation?: string;
}

/**
 * Warning raised while cascading; never fatal
 */
export interface CascadeWarning {
  code: CascadeWarningCode;
  artifactId: string;
  message: string;
  details?: Record<string, string>;
}

/**
 * Output of one relation processor call
 */
export interface RelationResult {
  candidates: CandidateColumn[];
  /** Technical and role fields; each name is injected at most once per cascade call */
  technicalFields: CandidateColumn[];
  warnings: CascadeWarning[];
}

/**
 * Outcome of cascading a single artifact
 */
export interface ArtifactCascadeResult {
  artifactId: string;
  status: CascadeStatus;
  columnsAdded: number;
  duplicatesSkipped: number;
  referencesProcessed: number;
  referencesSkipped: number;
  warnings: CascadeWarning[];
  error?: string;
}

/**
 * Outcome of a full cascade run
 */
export interface CascadeRunReport {
  runId: string;
  startedAt: Date;
  completedAt: Date;
  processed: number;
  skipped: number;
  failed: number;
  columnsAdded: number;
  results: ArtifactCascadeResult[];
  warnings: CascadeWarning[];
}

/**
 * Outcome of the duplicate cleanup pass
 */
export interface DuplicateCleanupResult {
  removed: number;
  byArtifact: Record<string, number>;
}

/**
 * Outcome of id re-enumeration
 */
export interface ReenumerationResult {
  total: number;
  remapped: number;
}
