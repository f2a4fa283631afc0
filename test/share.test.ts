import { it, assert, describe } from "vitest";
import {
  assert as check,
  assertHasNode,
  assertSymmetric,
  nullthrows,
  NodeNotInGraphError,
  UndirectedGraph,
} from "../src";

describe("NodeNotInGraphError", () => {
  it("renders the fixed message", () => {
    const error = new NodeNotInGraphError();
    assert.equal(error.message, "accessing a node that is not in the graph");
    assert.equal(error.name, "NodeNotInGraphError");
    assert.equal(
      `${error}`,
      "NodeNotInGraphError: accessing a node that is not in the graph"
    );
    assert.instanceOf(error, Error);
  });

  it("keeps the message when a node is given", () => {
    const error = new NodeNotInGraphError("ghost");
    assert.equal(error.node, "ghost");
    assert.equal(error.message, "accessing a node that is not in the graph");
  });

  it("clone is a distinct, equal error", () => {
    const error = new NodeNotInGraphError("ghost");
    const copy = error.clone();
    assert.notStrictEqual(copy, error);
    assert.instanceOf(copy, NodeNotInGraphError);
    assert.isTrue(copy.equals(error));
    assert.isTrue(error.equals(copy));
  });

  it("equals compares kind and node", () => {
    const error = new NodeNotInGraphError("a");
    assert.isFalse(error.equals(new NodeNotInGraphError("b")));
    assert.isFalse(error.equals(new NodeNotInGraphError()));
    assert.isFalse(error.equals(new Error(error.message)));
    assert.isTrue(new NodeNotInGraphError().equals(new NodeNotInGraphError()));
  });

  it("is narrows unknown values", () => {
    assert.isTrue(NodeNotInGraphError.is(new NodeNotInGraphError()));
    assert.isFalse(NodeNotInGraphError.is(new Error("x")));
    assert.isFalse(NodeNotInGraphError.is("accessing a node"));
  });
});

describe("share", () => {
  it("assertHasNode throws only for missing nodes", () => {
    const graph = new UndirectedGraph();
    graph.addNode("a");
    assert.doesNotThrow(() => assertHasNode(graph, "a"));
    assert.throws(
      () => assertHasNode(graph, "b"),
      NodeNotInGraphError,
      "accessing a node that is not in the graph"
    );
  });

  it("assertSymmetric checks storage built outside addEdge", () => {
    const graph = new UndirectedGraph();
    graph.addEdge(["a", "b", 1]);
    assert.doesNotThrow(() => assertSymmetric(graph));
    graph.adjacencyTableMutable().set("c", [["a", 9]]);
    assert.throws(
      () => assertSymmetric(graph),
      "Edge from c to a with weight 9 has no matching reverse entry"
    );
  });

  it("nullthrows", () => {
    assert.equal(nullthrows(0), 0);
    assert.throws(() => nullthrows(null), "Got unexpected null");
    assert.throws(() => nullthrows(undefined, "missing"), "missing");
  });

  it("assert", () => {
    assert.doesNotThrow(() => check(true));
    assert.throws(() => check(false, "boom"), "boom");
    const error = new RangeError("range");
    assert.throws(() => check(0, error), RangeError, "range");
  });
});
