/**
 * Cascading Engine interface for the column cascading engine
 */

import {
  ArtifactCascadeResult,
  CascadeRunReport,
  Column
} from '../types/index.js';

/**
 * Cascading Engine interface
 * Walks the artifact graph and merges derived columns into each target
 */
export interface ICascadingEngine {
  // Full and targeted runs
  cascadeAll(): CascadeRunReport;
  cascadeMissing(): CascadeRunReport;
  cascadeArtifact(targetArtifactId: string): ArtifactCascadeResult;
  regenerateAll(): CascadeRunReport;

  // Rendering support
  listColumnsInDisplayOrder(artifactId: string): Column[];
}
