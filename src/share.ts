import type { GraphStorage, Neighbor, NodeLabel } from "./type";

export const nullthrows = <T>(
  x: T | null | undefined,
  message?: string
): NonNullable<T> => {
  if (x != null) {
    return x;
  }
  const error = new Error(
    message !== undefined ? message : "Got unexpected " + x
  );
  throw error;
};

export const assert = (v: unknown, msg?: string | Error) => {
  if (!v) {
    if (msg instanceof Error) throw msg;
    throw new Error(msg);
  }
};

export const NODE_NOT_IN_GRAPH_MESSAGE =
  "accessing a node that is not in the graph";

export class NodeNotInGraphError extends Error {
  readonly node?: NodeLabel;
  constructor(node?: NodeLabel) {
    super(NODE_NOT_IN_GRAPH_MESSAGE);
    this.name = "NodeNotInGraphError";
    this.node = node;
  }

  clone(): NodeNotInGraphError {
    return new NodeNotInGraphError(this.node);
  }

  equals(other: unknown): boolean {
    return NodeNotInGraphError.is(other) && other.node === this.node;
  }

  static is(value: unknown): value is NodeNotInGraphError {
    return value instanceof NodeNotInGraphError;
  }
}

export function assertHasNode(graph: GraphStorage, node: NodeLabel) {
  if (!graph.adjacencyTable().has(node)) {
    throw new NodeNotInGraphError(node);
  }
}

const countEntries = (
  list: readonly Neighbor[] | undefined,
  to: NodeLabel,
  weight: number
) => (list ?? []).filter(([n, w]) => n === to && w === weight).length;

// Every (from, to, weight) entry needs as many (to, from, weight) entries.
export function assertSymmetric(graph: GraphStorage) {
  let table = graph.adjacencyTable();
  for (let [from, list] of table) {
    for (let [to, weight] of list) {
      assert(
        countEntries(list, to, weight) ===
          countEntries(table.get(to), from, weight),
        `Edge from ${from} to ${to} with weight ${weight} has no matching reverse entry`
      );
    }
  }
}
