/**
 * Incidence lists: array-chained adjacency for directed graphs, and
 * depth-first labeling over it.
 *
 * This module re-exports the public API:
 * - Edge lists and the forward/reverse incidence list builder
 * - Iterative and recursive depth-first traversal
 * - Input validation errors
 * - The edge list text parser and diagnostic dumps
 *
 * @example
 * ```ts
 * import { createEdgeList, constructIncidenceList, depthFirstSearch } from "incidence-lists";
 * const edges = createEdgeList([[1, 2], [2, 3]]);
 * const graph = constructIncidenceList(edges, 3, 2);
 * const { preLabel, postLabel } = depthFirstSearch(edges, graph, 3, 1);
 * ```
 *
 * @module
 */
export {
  createEdgeList,
  type EdgeId,
  type EdgeList,
  edgeCount,
  edgePairs,
  NO_EDGE,
  type VertexId,
} from "./graph/edgeList.ts";

export {
  constructIncidenceList,
  type DirectedGraph,
  inEdges,
  outEdges,
  vertexCount,
} from "./graph/incidenceList.ts";

export {
  GraphInputError,
  InvalidVertexIdError,
  LengthMismatchError,
  validateEdgeList,
} from "./graph/validation.ts";

export { randEdgeList, type RandomSource } from "./graph/generator.ts";

export {
  depthFirstSearch,
  depthFirstSearchRecursive,
  type DfsTime,
  discoveryOrder,
} from "./traversal/dfs.ts";

export { type ParsedEdgeList, parseEdgeList } from "./parser/edgeList.ts";
export { EdgeListParseError, ParseError } from "./parser/parseError.ts";

export {
  formatArray,
  formatDfsTime,
  formatIncidenceList,
} from "./render/dump.ts";

export { SAMPLE_GRAPH } from "./consts/sampleGraph.ts";
