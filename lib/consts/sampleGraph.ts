import { createEdgeList, type EdgeList } from "../graph/edgeList.ts";

/**
 * Six vertices, nine edges:
 *
 * ```
 * 1 -> 2, 1 -> 5, 6 -> 2, 6 -> 5, 4 -> 1, 5 -> 4, 3 -> 6, 2 -> 3, 4 -> 3
 * ```
 */
export const SAMPLE_GRAPH: { edges: EdgeList; n: number; m: number } = {
  edges: createEdgeList([
    [1, 2],
    [1, 5],
    [6, 2],
    [6, 5],
    [4, 1],
    [5, 4],
    [3, 6],
    [2, 3],
    [4, 3],
  ]),
  n: 6,
  m: 9,
};
