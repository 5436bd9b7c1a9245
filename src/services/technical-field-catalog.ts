/**
 * Technical field catalog
 *
 * Built-in audit and partition columns per pipeline layer, plus
 * artifact-kind fields for business-side targets. Used when a store has no
 * technical column table of its own, and to seed the table of a new store.
 * "{stage}" in a name is replaced by the target stage name.
 */

import { ArtifactType, Stage, StageLayer, TechnicalFieldDefinition } from '../types/index.js';
import { detectStageLayer } from './stage-layers.js';

export interface TechnicalFieldTemplate {
  name: string;
  dataType: string;
  comment: string;
  /** Kept by the next stage when the column reaches it */
  carryForward: boolean;
}

function sourceLineageFields(carryForward: boolean): TechnicalFieldTemplate[] {
  return [
    { name: '__SourceSystem', dataType: 'STRING', comment: 'Source system of the record', carryForward },
    { name: '__SourceFileName', dataType: 'STRING', comment: 'Source file name of the record', carryForward },
    { name: '__SourceFilePath', dataType: 'STRING', comment: 'Source file path of the record', carryForward }
  ];
}

const LAST_UPDATE_FIELD: TechnicalFieldTemplate = {
  name: '__{stage}_last_update_dt',
  dataType: 'TIMESTAMP',
  comment: 'Last update timestamp for {stage} stage',
  carryForward: false
};

export const LAYER_TECHNICAL_FIELDS: Record<StageLayer, TechnicalFieldTemplate[]> = {
  landing: [],
  bronze: [
    ...sourceLineageFields(true),
    {
      name: '__{stage}_insert_dt',
      dataType: 'TIMESTAMP',
      comment: 'Change data capture insert timestamp for {stage} stage',
      carryForward: true
    },
    { name: '__{stage}_Partition_InsertYear', dataType: 'INT', comment: 'Insert year partition', carryForward: false },
    { name: '__{stage}_Partition_InsertMonth', dataType: 'INT', comment: 'Insert month partition', carryForward: false },
    { name: '__{stage}_Partition_InsertDate', dataType: 'INT', comment: 'Insert date partition', carryForward: false }
  ],
  silver: [...sourceLineageFields(false), LAST_UPDATE_FIELD],
  gold: [LAST_UPDATE_FIELD],
  mart: [LAST_UPDATE_FIELD],
  semantic_model: []
};

export const ARTIFACT_TYPE_TECHNICAL_FIELDS: Record<ArtifactType, TechnicalFieldTemplate[]> = {
  dimension: [
    {
      name: '__valid_from_dt',
      dataType: 'TIMESTAMP',
      comment: 'Start of the validity window of the dimension row',
      carryForward: false
    },
    {
      name: '__valid_to_dt',
      dataType: 'TIMESTAMP',
      comment: 'End of the validity window of the dimension row',
      carryForward: false
    },
    { name: '__is_current', dataType: 'BOOLEAN', comment: 'Marks the current version of the dimension row', carryForward: false }
  ],
  fact: [
    { name: '__fact_grain', dataType: 'STRING', comment: 'Grain of the fact row', carryForward: false },
    { name: '__fact_measure_unit', dataType: 'STRING', comment: 'Unit of the measures of the fact row', carryForward: false }
  ],
  bridge: [],
  unknown: []
};

const ARTIFACT_TYPES: readonly ArtifactType[] = ['dimension', 'fact', 'bridge', 'unknown'];

function toDefinition(
  stage: Stage,
  template: TechnicalFieldTemplate,
  order: number,
  artifactType?: ArtifactType
): TechnicalFieldDefinition {
  return {
    stageId: stage.id,
    name: template.name,
    dataType: template.dataType,
    group: 'technical',
    order,
    carryForward: template.carryForward,
    artifactType,
    comment: template.comment
  };
}

/**
 * Whether artifact-kind fields apply to artifacts of the stage
 */
function takesArtifactTypeFields(stage: Stage): boolean {
  return stage.side === 'business' && detectStageLayer(stage) !== 'semantic_model';
}

/**
 * Fields of a target artifact as the built-in catalog defines them.
 * Layer fields apply only across a recognised transition.
 */
export function catalogFieldsFor(
  targetStage: Stage,
  targetArtifactType: ArtifactType,
  withLayerFields: boolean
): TechnicalFieldDefinition[] {
  const layer = detectStageLayer(targetStage);
  const templates = withLayerFields && layer ? [...LAYER_TECHNICAL_FIELDS[layer]] : [];
  if (takesArtifactTypeFields(targetStage)) {
    templates.push(...ARTIFACT_TYPE_TECHNICAL_FIELDS[targetArtifactType]);
  }
  return templates.map((template, index) => toDefinition(targetStage, template, index));
}

/**
 * Layer fields the catalog assigns to a stage, used to tell which of its
 * technical columns move on downstream
 */
export function catalogLayerFields(stage: Stage): TechnicalFieldDefinition[] {
  const layer = detectStageLayer(stage);
  return layer ? LAYER_TECHNICAL_FIELDS[layer].map((template, index) => toDefinition(stage, template, index)) : [];
}

/**
 * Technical column table of a new store: the catalog written out per stage
 */
export function defaultTechnicalFields(stages: readonly Stage[]): TechnicalFieldDefinition[] {
  const definitions: TechnicalFieldDefinition[] = [];
  for (const stage of stages) {
    let order = 1;
    const layer = detectStageLayer(stage);
    for (const template of layer ? LAYER_TECHNICAL_FIELDS[layer] : []) {
      definitions.push(toDefinition(stage, template, order++));
    }
    if (takesArtifactTypeFields(stage)) {
      for (const artifactType of ARTIFACT_TYPES) {
        for (const template of ARTIFACT_TYPE_TECHNICAL_FIELDS[artifactType]) {
          definitions.push(toDefinition(stage, template, order++, artifactType));
        }
      }
    }
  }
  return definitions;
}
