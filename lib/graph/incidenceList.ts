/**
 * Forward and reverse incidence lists.
 *
 * Each vertex's out-edges (and in-edges) form a singly linked chain of
 * edge ids stored in two flat arrays: `edgeFirst[v]` holds the first
 * edge of v's chain and `edgeNext[a]` the edge after a. Edge id 0 ends a
 * chain, so every slot is a plain integer and no per-vertex containers
 * are allocated.
 *
 * @example
 * ```ts
 * const edges = createEdgeList([[1, 2], [1, 3], [2, 3]]);
 * const graph = constructIncidenceList(edges, 3, 3);
 * [...outEdges(graph, 1)]; // [1, 2]
 * ```
 *
 * @module
 */
import {
  type EdgeId,
  type EdgeList,
  NO_EDGE,
  type VertexId,
} from "./edgeList.ts";
import { assertVertex, validateEdgeList } from "./validation.ts";

export interface DirectedGraph {
  /** First out-edge of each vertex, length n+1. */
  readonly edgeFirst: Uint32Array;
  /** Next out-edge with the same tail, length m+1. */
  readonly edgeNext: Uint32Array;
  /** First in-edge of each vertex, length n+1. */
  readonly revEdgeFirst: Uint32Array;
  /** Next in-edge with the same head, length m+1. */
  readonly revEdgeNext: Uint32Array;
}

/**
 * Builds the incidence lists of an edge list over n vertices and m edges.
 *
 * Edges are prepended to their chains from edge m down to edge 1, so
 * every chain lists its edges in ascending id order.
 *
 * @throws {LengthMismatchError} when the edge list is not sized for m
 * @throws {InvalidVertexIdError} when an endpoint is outside 1..n
 */
export function constructIncidenceList(
  edges: EdgeList,
  n: number,
  m: number,
): DirectedGraph {
  validateEdgeList(edges, n, m);

  const edgeFirst = new Uint32Array(n + 1);
  const edgeNext = new Uint32Array(m + 1);
  const revEdgeFirst = new Uint32Array(n + 1);
  const revEdgeNext = new Uint32Array(m + 1);

  for (let a = m; a >= 1; a--) {
    const v = edges.tail[a];
    edgeNext[a] = edgeFirst[v];
    edgeFirst[v] = a;

    const w = edges.head[a];
    revEdgeNext[a] = revEdgeFirst[w];
    revEdgeFirst[w] = a;
  }

  return { edgeFirst, edgeNext, revEdgeFirst, revEdgeNext };
}

export function vertexCount(graph: DirectedGraph): number {
  return Math.max(graph.edgeFirst.length - 1, 0);
}

function* chain(
  first: Uint32Array,
  next: Uint32Array,
  v: VertexId,
): Generator<EdgeId> {
  for (let a = first[v]; a !== NO_EDGE; a = next[a]) {
    yield a;
  }
}

/**
 * Walks the forward chain of v.
 *
 * @returns the ids of the edges leaving v, in ascending order.
 */
export function outEdges(graph: DirectedGraph, v: VertexId): EdgeId[] {
  assertVertex(v, vertexCount(graph), "outEdges");
  return [...chain(graph.edgeFirst, graph.edgeNext, v)];
}

/**
 * Walks the reverse chain of v.
 *
 * @returns the ids of the edges entering v, in ascending order.
 */
export function inEdges(graph: DirectedGraph, v: VertexId): EdgeId[] {
  assertVertex(v, vertexCount(graph), "inEdges");
  return [...chain(graph.revEdgeFirst, graph.revEdgeNext, v)];
}
