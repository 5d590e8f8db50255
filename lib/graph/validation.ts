/**
 * Input checks for the incidence list builder and the traversal.
 *
 * @module
 */
import type { EdgeList } from "./edgeList.ts";

export class GraphInputError extends Error {}

/**
 * Array lengths disagree with each other or with the declared vertex
 * and edge counts.
 */
export class LengthMismatchError extends GraphInputError {}

export class InvalidVertexIdError extends GraphInputError {
  constructor(
    readonly vertex: number,
    readonly n: number,
    context: string,
  ) {
    super(`${context}: vertex ${vertex} is not in 1..${n}`);
  }
}

/** Largest count whose ids and n+1 array slots still fit in 32 bits. */
export const MAX_COUNT = 0xFFFF_FFFE;

function isCount(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_COUNT;
}

export function assertVertexCount(n: number): void {
  if (!isCount(n)) {
    throw new LengthMismatchError(
      `vertex count must be an integer in 0..${MAX_COUNT}, got ${n}`,
    );
  }
}

export function assertCounts(n: number, m: number): void {
  assertVertexCount(n);
  if (!isCount(m)) {
    throw new LengthMismatchError(
      `edge count must be an integer in 0..${MAX_COUNT}, got ${m}`,
    );
  }
}

export function assertVertex(v: number, n: number, context: string): void {
  if (!Number.isInteger(v) || v < 1 || v > n) {
    throw new InvalidVertexIdError(v, n, context);
  }
}

/**
 * Checks that `edges` describes exactly m edges over the vertices 1..n.
 *
 * @throws {LengthMismatchError} when tail/head lengths are not both m+1
 * @throws {InvalidVertexIdError} when an endpoint is outside 1..n
 */
export function validateEdgeList(edges: EdgeList, n: number, m: number): void {
  assertCounts(n, m);

  const { tail, head } = edges;
  if (tail.length !== head.length) {
    throw new LengthMismatchError(
      `tail has ${tail.length} slots but head has ${head.length}`,
    );
  }
  if (tail.length !== m + 1) {
    throw new LengthMismatchError(
      `expected ${m + 1} slots for ${m} edges, got ${tail.length}`,
    );
  }

  for (let a = 1; a <= m; a++) {
    assertVertex(tail[a], n, `tail of edge ${a}`);
    assertVertex(head[a], n, `head of edge ${a}`);
  }
}

