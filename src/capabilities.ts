import type {
  Edge,
  GraphStats,
  GraphStorage,
  IGraph,
  Neighbor,
  NodeLabel,
  SerializedAdjacencyTable,
  SerializedGraph,
} from "./type";
import { assertHasNode, nullthrows } from "./share";

// Shared operations of every graph realization. They only touch storage
// through the accessors, and call back into the graph for anything a
// realization may override.

export function addNode(graph: IGraph, node: NodeLabel): boolean {
  if (graph.contains(node)) {
    return false;
  }
  graph.adjacencyTableMutable().set(node, []);
  return true;
}

// Appends the forward entry only.
export function addEdge(graph: IGraph, edge: Edge): void {
  let [from, to, weight] = edge;
  if (!graph.contains(from)) {
    graph.addNode(from);
  }
  if (!graph.contains(to)) {
    graph.addNode(to);
  }
  nullthrows(graph.adjacencyTableMutable().get(from)).push([to, weight]);
}

export function contains(graph: GraphStorage, node: NodeLabel): boolean {
  return graph.adjacencyTable().has(node);
}

export function nodes(graph: GraphStorage): Set<NodeLabel> {
  return new Set(graph.adjacencyTable().keys());
}

export function* getAllEdges(graph: GraphStorage): Iterable<Edge> {
  for (let [from, neighbors] of graph.adjacencyTable()) {
    for (let [to, weight] of neighbors) {
      yield [from, to, weight];
    }
  }
}

export function edges(graph: GraphStorage): Edge[] {
  return [...getAllEdges(graph)];
}

/**
 * Lookup without auto-creation.
 * @throws {NodeNotInGraphError} when `node` was never added
 */
export function neighbors(
  graph: GraphStorage,
  node: NodeLabel
): readonly Neighbor[] {
  assertHasNode(graph, node);
  return nullthrows(graph.adjacencyTable().get(node));
}

export function stats(graph: GraphStorage): GraphStats {
  let edgeCount = 0;
  for (let list of graph.adjacencyTable().values()) {
    edgeCount += list.length;
  }
  return { nodes: graph.adjacencyTable().size, edges: edgeCount };
}

export function copyAdjacencyTable(
  table: Iterable<readonly [NodeLabel, readonly Neighbor[]]>
): SerializedAdjacencyTable {
  let copy: SerializedAdjacencyTable = [];
  for (let [node, list] of table) {
    copy.push([node, list.map(([to, weight]): Neighbor => [to, weight])]);
  }
  return copy;
}

export function serialize(graph: GraphStorage): SerializedGraph {
  return { adjacencyTable: copyAdjacencyTable(graph.adjacencyTable()) };
}

export const defaultCapabilities = {
  addNode,
  addEdge,
  contains,
  nodes,
  edges,
  getAllEdges,
  neighbors,
  stats,
  serialize,
} as const;

export type GraphCapabilities = typeof defaultCapabilities;
