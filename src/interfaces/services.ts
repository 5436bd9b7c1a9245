/**
 * Service interfaces for the column cascading engine
 */

import {
  ArtifactType,
  Column,
  DuplicateCleanupResult,
  ReenumerationResult,
  RelationContext,
  RelationResult,
  Stage,
  StageTransition
} from '../types/index.js';

/**
 * Relation Processor interface
 * Pure derivation of candidate columns for one upstream reference
 */
export interface IRelationProcessor {
  process(relationKind: string, upstreamColumns: readonly Column[], context: RelationContext): RelationResult;
  detectArtifactType(name: string, explicitField?: string): ArtifactType;
  detectTransition(source: string | Stage, target: string | Stage): StageTransition;
}

/**
 * Column Identity Allocator interface
 * Hands out store-wide unique, strictly increasing column ids
 */
export interface IColumnIdAllocator {
  next(): number;
  peek(): number;
}

/**
 * Cleanup Service interface
 * Idempotent maintenance passes over the column store
 */
export interface ICleanupService {
  removeDuplicateColumns(): DuplicateCleanupResult;
  reenumerateIds(): ReenumerationResult;
  runMaintenance(): { duplicates: DuplicateCleanupResult; reenumeration: ReenumerationResult };
}
