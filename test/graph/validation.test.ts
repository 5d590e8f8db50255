import { expect } from "chai";
import { describe, it } from "mocha";

import { createEdgeList } from "../../lib/graph/edgeList.ts";
import { constructIncidenceList } from "../../lib/graph/incidenceList.ts";
import {
  GraphInputError,
  InvalidVertexIdError,
  LengthMismatchError,
  validateEdgeList,
} from "../../lib/graph/validation.ts";

describe("validateEdgeList", () => {
  it("accepts a consistent edge list", () => {
    const edges = createEdgeList([[1, 2], [2, 1]]);
    expect(() => validateEdgeList(edges, 2, 2)).to.not.throw();
  });

  it("reports an endpoint above n", () => {
    const edges = { tail: [0, 1], head: [0, 3] };

    let caught: unknown;
    try {
      constructIncidenceList(edges, 2, 1);
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(InvalidVertexIdError);
    expect(caught).to.be.instanceOf(GraphInputError);
    if (caught instanceof InvalidVertexIdError) {
      expect(caught.vertex).to.equal(3);
      expect(caught.n).to.equal(2);
      expect(caught.message).to.equal(
        "head of edge 1: vertex 3 is not in 1..2",
      );
    }
  });

  it("reports a zero tail", () => {
    const edges = { tail: [0, 1, 0], head: [0, 2, 1] };
    expect(() => validateEdgeList(edges, 2, 2)).to.throw(
      InvalidVertexIdError,
      "tail of edge 2: vertex 0 is not in 1..2",
    );
  });

  it("reports a non-integer endpoint", () => {
    const edges = { tail: [0, 1.5], head: [0, 1] };
    expect(() => validateEdgeList(edges, 2, 1)).to.throw(InvalidVertexIdError);
  });

  it("reports tail and head of different lengths", () => {
    const edges = { tail: [0, 1, 2], head: [0, 2] };
    expect(() => validateEdgeList(edges, 2, 2)).to.throw(
      LengthMismatchError,
      "tail has 3 slots but head has 2",
    );
  });

  it("reports an edge count that disagrees with the arrays", () => {
    const edges = createEdgeList([[1, 2], [2, 1]]);
    expect(() => constructIncidenceList(edges, 2, 3)).to.throw(
      LengthMismatchError,
      "expected 4 slots for 3 edges, got 3",
    );
  });

  it("reports negative or fractional counts", () => {
    const edges = createEdgeList([]);
    expect(() => validateEdgeList(edges, -1, 0)).to.throw(
      LengthMismatchError,
      "vertex count must be an integer in 0..4294967294, got -1",
    );
    expect(() => validateEdgeList(edges, 1, 0.5)).to.throw(
      LengthMismatchError,
      "edge count must be an integer in 0..4294967294, got 0.5",
    );
  });

  it("reports counts too large for 32-bit ids", () => {
    const edges = createEdgeList([]);
    expect(() => constructIncidenceList(edges, 5_000_000_000, 0)).to.throw(
      LengthMismatchError,
      "vertex count must be an integer in 0..4294967294, got 5000000000",
    );
    expect(() => validateEdgeList(edges, 1, 4_294_967_295)).to.throw(
      LengthMismatchError,
      "edge count must be an integer in 0..4294967294, got 4294967295",
    );
  });
});
