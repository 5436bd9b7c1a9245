/**
 * Stage layer and transition detection
 */

import { Stage, StageLayer, StageTransition } from '../types/index.js';

const STAGE_ID_LAYERS = new Map<string, StageLayer>([
  ['s0', 'landing'],
  ['s1', 'bronze'],
  ['s2', 'silver'],
  ['s3', 'gold'],
  ['s4', 'mart'],
  ['s5', 'semantic_model']
]);

// checked in this order against the lower-cased stage name
const STAGE_NAME_PATTERNS: ReadonlyArray<readonly [StageLayer, readonly string[]]> = [
  ['landing', ['landing', 'drop_zone', 'drop zone']],
  ['bronze', ['bronze']],
  ['silver', ['silver']],
  ['gold', ['gold']],
  ['mart', ['mart']],
  ['semantic_model', ['pbi', 'semantic']]
];

const TRANSITIONS = new Map<string, StageTransition>([
  ['landing>bronze', 'landing_to_bronze'],
  ['bronze>silver', 'bronze_to_silver'],
  ['silver>gold', 'silver_to_gold'],
  ['gold>mart', 'gold_to_mart'],
  ['mart>semantic_model', 'mart_to_semantic_model']
]);

/**
 * Map a stage (or a bare stage id / name) onto its pipeline layer
 */
export function detectStageLayer(stage: Stage | string): StageLayer | undefined {
  const id = typeof stage === 'string' ? stage : stage.id;
  const byId = STAGE_ID_LAYERS.get(id.trim().toLowerCase());
  if (byId) {
    return byId;
  }
  const name = (typeof stage === 'string' ? stage : stage.name).toLowerCase();
  for (const [layer, patterns] of STAGE_NAME_PATTERNS) {
    if (patterns.some(pattern => name.includes(pattern))) {
      return layer;
    }
  }
  return undefined;
}

export function detectTransition(source: Stage | string, target: Stage | string): StageTransition {
  const sourceLayer = detectStageLayer(source);
  const targetLayer = detectStageLayer(target);
  if (!sourceLayer || !targetLayer) {
    return 'unspecified';
  }
  return TRANSITIONS.get(`${sourceLayer}>${targetLayer}`) ?? 'unspecified';
}
