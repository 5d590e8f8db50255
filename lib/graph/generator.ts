/**
 * Random edge list generation.
 *
 * Produces edge lists of a given size from a seeded random source, so
 * that property checks are reproducible.
 *
 * @module
 */
import { createEdgeList, type EdgeList, type VertexId } from "./edgeList.ts";

/**
 * Where endpoints come from. Any seeded generator with an inclusive
 * integer draw fits, e.g. the one from `random-seed`.
 */
export interface RandomSource {
  /** Integer in min..max, both ends included. */
  intBetween(min: number, max: number): number;
}

/**
 * @param rs the random source to use.
 * @param n number of vertices, at least 1.
 * @param m number of edges. Self-loops and parallel edges may occur.
 */
export const randEdgeList = (
  rs: RandomSource,
  n: number,
  m: number,
): EdgeList => {
  if (n <= 0) {
    throw new Error("A random graph must contain at least one vertex.");
  }

  const pairs: Array<[VertexId, VertexId]> = [];
  for (let a = 0; a < m; a++) {
    pairs.push([rs.intBetween(1, n), rs.intBetween(1, n)]);
  }
  return createEdgeList(pairs);
};
