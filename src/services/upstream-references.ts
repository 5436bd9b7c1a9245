/**
 * Parsing of upstream declarations into reference lists
 */

import { Artifact, UpstreamReference, UpstreamReferenceError } from '../types/index.js';

const LIST_SEPARATOR = /[,;]/;

function splitList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(LIST_SEPARATOR)
    .map(part => part.trim())
    .filter(part => part !== '');
}

/**
 * Resolve the upstream references of an artifact.
 *
 * A single relation kind applies to every upstream id; a relation list must
 * have one entry per id. Relation kinds are lower-cased but not validated.
 * Without any relation kind there is nothing to cascade and the list is empty.
 */
export function parseUpstreamReferences(artifact: Artifact): UpstreamReference[] {
  const artifactIds = splitList(artifact.upstreamArtifact);
  if (artifactIds.length === 0) {
    return [];
  }

  const relations = splitList(artifact.relationType).map(r => r.toLowerCase());
  if (relations.length === 0) {
    return [];
  }
  if (relations.length !== 1 && relations.length !== artifactIds.length) {
    throw new UpstreamReferenceError(
      artifact.id,
      `Artifact ${artifact.id} has ${artifactIds.length} upstream artifact(s) but ${relations.length} relation types`
    );
  }

  return artifactIds.map((artifactId, index) => ({
    artifactId,
    relationKind: relations.length === 1 ? relations[0] : relations[index]
  }));
}

export function hasUpstreamDeclaration(artifact: Artifact): boolean {
  return splitList(artifact.upstreamArtifact).length > 0;
}

export function hasRelationDeclaration(artifact: Artifact): boolean {
  return splitList(artifact.relationType).length > 0;
}

/**
 * Whether the artifact's columns are derived from upstream: it names
 * upstream ids and a relation list that fits them
 */
export function isCascadable(artifact: Artifact): boolean {
  const ids = splitList(artifact.upstreamArtifact).length;
  const relations = splitList(artifact.relationType).length;
  return ids > 0 && (relations === 1 || (relations > 0 && relations === ids));
}

/**
 * Upstream ids of an artifact without validating its relation list
 */
export function upstreamArtifactIds(artifact: Artifact): string[] {
  return splitList(artifact.upstreamArtifact);
}

/**
 * Order derived artifacts so that each follows the derived artifacts it
 * reads from, keeping store order otherwise. Artifacts caught in (or
 * behind) a cycle cannot be placed and are returned apart, in store order.
 */
export function orderUpstreamFirst(artifacts: readonly Artifact[]): { ordered: Artifact[]; cyclic: Artifact[] } {
  const ids = new Set(artifacts.map(a => a.id));
  const ordered: Artifact[] = [];
  const placed = new Set<string>();
  let remaining = [...artifacts];

  let progress = true;
  while (remaining.length > 0 && progress) {
    progress = false;
    const blocked: Artifact[] = [];
    for (const artifact of remaining) {
      const ready = upstreamArtifactIds(artifact).every(id => !ids.has(id) || placed.has(id));
      if (ready) {
        ordered.push(artifact);
        placed.add(artifact.id);
        progress = true;
      } else {
        blocked.push(artifact);
      }
    }
    remaining = blocked;
  }

  return { ordered, cyclic: remaining };
}
