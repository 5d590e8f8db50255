/**
 * Plain-text dumps of incidence lists and traversal labels, for reading
 * by eye. Every array is printed whole, slot 0 included.
 *
 * @module
 */
import type { DirectedGraph } from "../graph/incidenceList.ts";
import type { DfsTime } from "../traversal/dfs.ts";

export function formatArray(values: ArrayLike<number>): string {
  return `[${Array.from(values).join(", ")}]`;
}

function formatFields(fields: Array<[string, ArrayLike<number>]>): string {
  return fields.map(([name, values]) => `${name}: ${formatArray(values)}`)
    .join("\n");
}

export function formatIncidenceList(graph: DirectedGraph): string {
  return formatFields([
    ["edge_first", graph.edgeFirst],
    ["edge_next", graph.edgeNext],
    ["rev_edge_first", graph.revEdgeFirst],
    ["rev_edge_next", graph.revEdgeNext],
  ]);
}

export function formatDfsTime(time: DfsTime): string {
  return formatFields([
    ["pre_label", time.preLabel],
    ["post_label", time.postLabel],
  ]);
}
