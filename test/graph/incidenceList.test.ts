import { expect } from "chai";
import { describe, it } from "mocha";

import { SAMPLE_GRAPH } from "../../lib/consts/sampleGraph.ts";
import { createEdgeList } from "../../lib/graph/edgeList.ts";
import {
  constructIncidenceList,
  type DirectedGraph,
  inEdges,
  outEdges,
  vertexCount,
} from "../../lib/graph/incidenceList.ts";
import { InvalidVertexIdError } from "../../lib/graph/validation.ts";

function asArrays(graph: DirectedGraph) {
  return {
    edgeFirst: Array.from(graph.edgeFirst),
    edgeNext: Array.from(graph.edgeNext),
    revEdgeFirst: Array.from(graph.revEdgeFirst),
    revEdgeNext: Array.from(graph.revEdgeNext),
  };
}

describe("constructIncidenceList", () => {
  it("chains the sample graph's edges per tail and per head", () => {
    const { edges, n, m } = SAMPLE_GRAPH;
    const graph = constructIncidenceList(edges, n, m);

    expect(asArrays(graph)).to.deep.equal({
      edgeFirst: [0, 1, 8, 7, 5, 6, 3],
      edgeNext: [0, 2, 0, 4, 0, 9, 0, 0, 0, 0],
      revEdgeFirst: [0, 5, 1, 8, 6, 2, 7],
      revEdgeNext: [0, 3, 4, 0, 0, 0, 0, 0, 9, 0],
    });
  });

  it("keeps input order within every chain", () => {
    const { edges, n, m } = SAMPLE_GRAPH;
    const graph = constructIncidenceList(edges, n, m);

    expect(outEdges(graph, 1)).to.deep.equal([1, 2]);
    expect(outEdges(graph, 4)).to.deep.equal([5, 9]);
    expect(outEdges(graph, 6)).to.deep.equal([3, 4]);
    expect(inEdges(graph, 2)).to.deep.equal([1, 3]);
    expect(inEdges(graph, 3)).to.deep.equal([8, 9]);
    expect(inEdges(graph, 5)).to.deep.equal([2, 4]);
  });

  it("puts a self-loop in both chains of its vertex", () => {
    const edges = createEdgeList([[2, 2]]);
    const graph = constructIncidenceList(edges, 3, 1);

    expect(Array.from(graph.edgeFirst)).to.deep.equal([0, 0, 1, 0]);
    expect(Array.from(graph.revEdgeFirst)).to.deep.equal([0, 0, 1, 0]);
    expect(outEdges(graph, 2)).to.deep.equal([1]);
    expect(inEdges(graph, 2)).to.deep.equal([1]);
  });

  it("gives parallel edges their own chain links", () => {
    const edges = createEdgeList([[1, 2], [1, 2]]);
    const graph = constructIncidenceList(edges, 2, 2);

    expect(asArrays(graph)).to.deep.equal({
      edgeFirst: [0, 1, 0],
      edgeNext: [0, 2, 0],
      revEdgeFirst: [0, 0, 1],
      revEdgeNext: [0, 2, 0],
    });
  });

  it("leaves isolated vertices with empty chains", () => {
    const edges = createEdgeList([[1, 3]]);
    const graph = constructIncidenceList(edges, 4, 1);

    expect(vertexCount(graph)).to.equal(4);
    expect(outEdges(graph, 2)).to.deep.equal([]);
    expect(inEdges(graph, 2)).to.deep.equal([]);
    expect(outEdges(graph, 4)).to.deep.equal([]);
  });

  it("builds an empty graph", () => {
    const graph = constructIncidenceList(createEdgeList([]), 0, 0);

    expect(asArrays(graph)).to.deep.equal({
      edgeFirst: [0],
      edgeNext: [0],
      revEdgeFirst: [0],
      revEdgeNext: [0],
    });
  });

  it("rejects chain reads outside the vertex range", () => {
    const graph = constructIncidenceList(createEdgeList([[1, 2]]), 2, 1);

    expect(() => outEdges(graph, 3)).to.throw(
      InvalidVertexIdError,
      "outEdges: vertex 3 is not in 1..2",
    );
    expect(() => inEdges(graph, 0)).to.throw(InvalidVertexIdError);
  });
});
