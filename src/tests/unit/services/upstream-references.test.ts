/**
 * Unit tests for upstream declaration parsing
 */

import { describe, it, expect } from 'vitest';
import {
  hasRelationDeclaration,
  hasUpstreamDeclaration,
  isCascadable,
  orderUpstreamFirst,
  parseUpstreamReferences
} from '../../../services/upstream-references.js';
import { Artifact, UpstreamReferenceError } from '../../../types/index.js';

function artifact(upstreamArtifact?: string, relationType?: string): Artifact {
  return { id: 'target', name: 'target', stageId: 's3', upstreamArtifact, relationType };
}

describe('parseUpstreamReferences', () => {
  it('should return nothing without upstream artifacts', () => {
    expect(parseUpstreamReferences(artifact())).toEqual([]);
    expect(parseUpstreamReferences(artifact(' , ', 'main'))).toEqual([]);
  });

  it('should apply a single relation to every upstream id', () => {
    expect(parseUpstreamReferences(artifact('a1, a2', 'Main'))).toEqual([
      { artifactId: 'a1', relationKind: 'main' },
      { artifactId: 'a2', relationKind: 'main' }
    ]);
  });

  it('should pair relation lists with ids and accept semicolons', () => {
    expect(parseUpstreamReferences(artifact('a1;a2', 'main; get_key'))).toEqual([
      { artifactId: 'a1', relationKind: 'main' },
      { artifactId: 'a2', relationKind: 'get_key' }
    ]);
  });

  it('should keep unknown relation kinds for the processor to report', () => {
    expect(parseUpstreamReferences(artifact('a1', 'copy'))).toEqual([{ artifactId: 'a1', relationKind: 'copy' }]);
  });

  it('should reject a relation list of the wrong length', () => {
    expect(() => parseUpstreamReferences(artifact('a1,a2,a3', 'main,lookup'))).toThrow(UpstreamReferenceError);
  });

  it('should return nothing for upstream ids without a relation', () => {
    expect(parseUpstreamReferences(artifact('a1', ' '))).toEqual([]);
    expect(parseUpstreamReferences(artifact('a1, a2'))).toEqual([]);
  });
});

describe('hasUpstreamDeclaration', () => {
  it('should ignore empty list entries', () => {
    expect(hasUpstreamDeclaration(artifact(' ; '))).toBe(false);
    expect(hasUpstreamDeclaration(artifact('a1'))).toBe(true);
  });
});

describe('hasRelationDeclaration', () => {
  it('should ignore blank relation lists', () => {
    expect(hasRelationDeclaration(artifact('a1', ' , '))).toBe(false);
    expect(hasRelationDeclaration(artifact('a1', 'main'))).toBe(true);
  });
});

describe('isCascadable', () => {
  it('should require upstream ids and a fitting relation list', () => {
    expect(isCascadable(artifact())).toBe(false);
    expect(isCascadable(artifact('a1', ''))).toBe(false);
    expect(isCascadable(artifact('a1,a2', 'main'))).toBe(true);
    expect(isCascadable(artifact('a1,a2', 'main,lookup'))).toBe(true);
    expect(isCascadable(artifact('a1,a2,a3', 'main,lookup'))).toBe(false);
  });
});

describe('orderUpstreamFirst', () => {
  function derived(id: string, upstreamArtifact: string): Artifact {
    return { id, name: id, stageId: 's3', upstreamArtifact, relationType: 'main' };
  }

  it('should place each artifact after the derived artifacts it reads from', () => {
    const { ordered, cyclic } = orderUpstreamFirst([
      derived('mart', 'gold'),
      derived('gold', 'silver, src'),
      derived('silver', 'src'),
      derived('other', 'src')
    ]);

    expect(ordered.map(a => a.id)).toEqual(['silver', 'other', 'gold', 'mart']);
    expect(cyclic).toEqual([]);
  });

  it('should hold back cycles and what depends on them', () => {
    const { ordered, cyclic } = orderUpstreamFirst([
      derived('a', 'b'),
      derived('b', 'a'),
      derived('c', 'a'),
      derived('self', 'self'),
      derived('d', 'src')
    ]);

    expect(ordered.map(a => a.id)).toEqual(['d']);
    expect(cyclic.map(a => a.id)).toEqual(['a', 'b', 'c', 'self']);
  });
});
