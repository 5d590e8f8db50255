/**
 * Depth-first traversal over forward incidence lists.
 *
 * @module
 */
import {
  type EdgeId,
  type EdgeList,
  edgeCount,
  NO_EDGE,
  type VertexId,
} from "../graph/edgeList.ts";
import type { DirectedGraph } from "../graph/incidenceList.ts";
import {
  assertVertex,
  assertVertexCount,
  LengthMismatchError,
} from "../graph/validation.ts";

/**
 * Discovery and finish order of every vertex, indexed by vertex id.
 * 0 means the vertex was never reached.
 */
export interface DfsTime {
  readonly preLabel: Uint32Array;
  readonly postLabel: Uint32Array;
}

interface TraversalContext {
  readonly head: readonly VertexId[];
  readonly edgeFirst: Uint32Array;
  readonly edgeNext: Uint32Array;
  readonly preLabel: Uint32Array;
  readonly postLabel: Uint32Array;
  /** next pre-order label */
  k: number;
  /** next post-order label */
  j: number;
}

/** Head of edge a, which must lie in 1..n. */
function headOf(ctx: TraversalContext, a: EdgeId): VertexId {
  const w = ctx.head[a];
  assertVertex(w, ctx.preLabel.length - 1, `head of edge ${a}`);
  return w;
}

interface WorkFrame {
  vertex: VertexId;
  /** next out-edge of `vertex` to examine */
  edge: EdgeId;
}

function createContext(
  edges: EdgeList,
  graph: DirectedGraph,
  n: number,
  start: VertexId,
): TraversalContext {
  assertVertexCount(n);
  if (graph.edgeFirst.length !== n + 1) {
    throw new LengthMismatchError(
      `graph has ${graph.edgeFirst.length} vertex slots, expected ${n + 1}`,
    );
  }
  if (
    edges.head.length !== graph.edgeNext.length ||
    edges.tail.length !== edges.head.length
  ) {
    throw new LengthMismatchError(
      `graph was built for ${graph.edgeNext.length - 1} edges, ` +
        `edge list has ${edgeCount(edges)}`,
    );
  }
  assertVertex(start, n, "start vertex");

  return {
    head: edges.head,
    edgeFirst: graph.edgeFirst,
    edgeNext: graph.edgeNext,
    preLabel: new Uint32Array(n + 1),
    postLabel: new Uint32Array(n + 1),
    k: 1,
    j: 1,
  };
}

/**
 * Labels every vertex reachable from `start` with its pre-order and
 * post-order number. Out-edges are followed in chain order, i.e. in
 * ascending edge id.
 *
 * Runs on an explicit stack of (vertex, next edge) frames; recursion
 * depth does not grow with path length.
 *
 * @throws {InvalidVertexIdError} when start is outside 1..n
 * @throws {LengthMismatchError} when graph and edge list disagree
 */
export function depthFirstSearch(
  edges: EdgeList,
  graph: DirectedGraph,
  n: number,
  start: VertexId,
): DfsTime {
  const ctx = createContext(edges, graph, n, start);
  const stack: WorkFrame[] = [];

  const discover = (v: VertexId) => {
    ctx.preLabel[v] = ctx.k++;
    stack.push({ vertex: v, edge: ctx.edgeFirst[v] });
  };

  discover(start);
  while (stack.length > 0) {
    const frame = stack[stack.length - 1];
    if (frame.edge === NO_EDGE) {
      ctx.postLabel[frame.vertex] = ctx.j++;
      stack.pop();
      continue;
    }

    const a = frame.edge;
    frame.edge = ctx.edgeNext[a];
    const w = headOf(ctx, a);
    if (ctx.preLabel[w] === 0) {
      discover(w);
    }
  }

  return { preLabel: ctx.preLabel, postLabel: ctx.postLabel };
}

function visit(ctx: TraversalContext, v: VertexId): void {
  ctx.preLabel[v] = ctx.k++;
  for (let a = ctx.edgeFirst[v]; a !== NO_EDGE; a = ctx.edgeNext[a]) {
    const w = headOf(ctx, a);
    if (ctx.preLabel[w] === 0) {
      visit(ctx, w);
    }
  }
  ctx.postLabel[v] = ctx.j++;
}

/**
 * Recursive form of {@link depthFirstSearch}. Produces the same labels,
 * but the call stack grows with the longest path explored.
 */
export function depthFirstSearchRecursive(
  edges: EdgeList,
  graph: DirectedGraph,
  n: number,
  start: VertexId,
): DfsTime {
  const ctx = createContext(edges, graph, n, start);
  visit(ctx, start);
  return { preLabel: ctx.preLabel, postLabel: ctx.postLabel };
}

/**
 * @returns the vertices with a non-zero pre-order label, in discovery order.
 */
export function discoveryOrder(time: DfsTime): VertexId[] {
  const order: VertexId[] = [];
  for (let v = 1; v < time.preLabel.length; v++) {
    const label = time.preLabel[v];
    if (label !== 0) {
      order[label - 1] = v;
    }
  }
  return order;
}
