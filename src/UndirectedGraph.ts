import type {
  AdjacencyTable,
  Edge,
  GraphOpts,
  GraphStats,
  IGraph,
  Neighbor,
  NodeLabel,
  ReadonlyAdjacencyTable,
  SerializedGraph,
} from "./type";
import { copyAdjacencyTable, defaultCapabilities } from "./capabilities";
import { assertHasNode, assertSymmetric, nullthrows } from "./share";

export class UndirectedGraph implements IGraph {
  private readonly _adjacencyTable: AdjacencyTable;
  constructor(opts?: GraphOpts) {
    this._adjacencyTable = new Map(
      copyAdjacencyTable(opts?.adjacencyTable ?? [])
    );
    for (let list of this._adjacencyTable.values()) {
      for (let [to] of list) {
        assertHasNode(this, to);
      }
    }
    assertSymmetric(this);
  }

  adjacencyTableMutable(): AdjacencyTable {
    return this._adjacencyTable;
  }

  adjacencyTable(): ReadonlyAdjacencyTable {
    return this._adjacencyTable;
  }

  addNode(node: NodeLabel): boolean {
    return defaultCapabilities.addNode(this, node);
  }

  // Every edge is stored once per endpoint, with the same weight.
  addEdge(edge: Edge): void {
    defaultCapabilities.addEdge(this, edge);
    let [from, to, weight] = edge;
    nullthrows(this._adjacencyTable.get(to)).push([from, weight]);
  }

  contains(node: NodeLabel): boolean {
    return defaultCapabilities.contains(this, node);
  }

  nodes(): Set<NodeLabel> {
    return defaultCapabilities.nodes(this);
  }

  // Each logical edge appears twice, once per direction.
  edges(): Edge[] {
    return defaultCapabilities.edges(this);
  }

  // Returns an iterator of all edges in the graph. Same order as `edges()`.
  getAllEdges(): Iterable<Edge> {
    return defaultCapabilities.getAllEdges(this);
  }

  neighbors(node: NodeLabel): readonly Neighbor[] {
    return defaultCapabilities.neighbors(this, node);
  }

  get size(): GraphStats {
    return defaultCapabilities.stats(this);
  }

  serialize(): SerializedGraph {
    return defaultCapabilities.serialize(this);
  }

  static deserialize(opts: SerializedGraph): UndirectedGraph {
    return new UndirectedGraph({ adjacencyTable: opts.adjacencyTable });
  }
}
