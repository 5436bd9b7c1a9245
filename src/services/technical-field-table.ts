/**
 * Technical Field Table
 *
 * Read-only view of a store's technical column table. A store without
 * rows falls back to the built-in catalog.
 */

import { IPipelineRepository } from '../repository/pipeline-repository.js';
import {
  ArtifactType,
  Stage,
  StageTransition,
  TechnicalFieldDefinition,
  TechnicalFieldSource
} from '../types/index.js';
import { catalogFieldsFor, catalogLayerFields } from './technical-field-catalog.js';

const PLACEHOLDER = /\{[a-z_]+\}/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Pattern matching the names a definition produces in a stage; role
 * placeholders match any non-empty text
 */
export function technicalNamePattern(name: string, stageName: string): RegExp {
  const resolved = name.split('{stage}').join(stageName);
  const source = resolved.split(PLACEHOLDER).map(escapeRegExp).join('.+');
  return new RegExp(`^${source}$`, 'i');
}

export class TechnicalFieldTable implements TechnicalFieldSource {
  private readonly definitions: TechnicalFieldDefinition[];

  constructor(definitions: readonly TechnicalFieldDefinition[] = []) {
    this.definitions = definitions.map(definition => ({ ...definition }));
  }

  static fromRepository(repository: Pick<IPipelineRepository, 'getTechnicalFields'>): TechnicalFieldTable {
    return new TechnicalFieldTable(repository.getTechnicalFields());
  }

  get usesCatalog(): boolean {
    return this.definitions.length === 0;
  }

  /**
   * Definitions injected into an artifact of the target stage, by order
   */
  fieldsFor(targetStage: Stage, targetArtifactType: ArtifactType, transition: StageTransition): TechnicalFieldDefinition[] {
    if (this.usesCatalog) {
      return catalogFieldsFor(targetStage, targetArtifactType, transition !== 'unspecified');
    }
    return this.definitions
      .filter(d => d.stageId === targetStage.id)
      .filter(d => d.artifactType === undefined || d.artifactType === targetArtifactType)
      .sort((a, b) => a.order - b.order);
  }

  /**
   * Whether a technical column of the stage is kept downstream. Columns
   * no definition accounts for stay behind.
   */
  carriesForward(stage: Stage, columnName: string): boolean {
    const definitions = this.usesCatalog ? catalogLayerFields(stage) : this.definitions.filter(d => d.stageId === stage.id);
    const name = columnName.trim();
    const match = definitions.find(d => technicalNamePattern(d.name, stage.name).test(name));
    return match?.carryForward ?? false;
  }
}
