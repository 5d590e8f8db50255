/**
 * Directed edge lists.
 *
 * An edge list stores the tail and head of every edge in two parallel
 * arrays indexed by edge id. Ids start at 1; slot 0 of both arrays is
 * unused and holds 0.
 *
 * @module
 */

/** Vertex ids run from 1 to n. */
export type VertexId = number;

/** Edge ids run from 1 to m. 0 marks "no edge". */
export type EdgeId = number;

export const NO_EDGE: EdgeId = 0;

export interface EdgeList {
  /** tail[a] is the vertex edge a leaves. */
  readonly tail: readonly VertexId[];
  /** head[a] is the vertex edge a enters. */
  readonly head: readonly VertexId[];
}

/**
 * Builds an edge list from [tail, head] pairs. The first pair becomes
 * edge 1, the second edge 2, and so on.
 */
export function createEdgeList(
  pairs: Iterable<readonly [VertexId, VertexId]>,
): EdgeList {
  const tail: VertexId[] = [0];
  const head: VertexId[] = [0];
  for (const [from, to] of pairs) {
    tail.push(from);
    head.push(to);
  }
  return { tail, head };
}

export function edgeCount(edges: EdgeList): number {
  return Math.max(edges.tail.length - 1, 0);
}

/**
 * @returns the edges as [tail, head] pairs in edge id order.
 */
export function edgePairs(edges: EdgeList): Array<[VertexId, VertexId]> {
  const pairs: Array<[VertexId, VertexId]> = [];
  for (let a = 1; a < edges.tail.length; a++) {
    pairs.push([edges.tail[a], edges.head[a]]);
  }
  return pairs;
}
