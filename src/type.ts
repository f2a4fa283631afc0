export type NodeLabel = string;

/** `[from, to, weight]` */
export type Edge = [from: NodeLabel, to: NodeLabel, weight: number];

/** `[neighbor, weight]` */
export type Neighbor = [to: NodeLabel, weight: number];

export type AdjacencyTable = Map<NodeLabel, Neighbor[]>;
export type ReadonlyAdjacencyTable = ReadonlyMap<
  NodeLabel,
  readonly Neighbor[]
>;

export type SerializedAdjacencyTable = Array<[NodeLabel, Neighbor[]]>;

export type GraphOpts = {
  adjacencyTable?: SerializedAdjacencyTable;
};

export type SerializedGraph = {
  adjacencyTable: SerializedAdjacencyTable;
};

export type GraphStats = {
  /** The number of nodes in the graph. */
  nodes: number;
  /** The number of stored neighbor entries, one per direction. */
  edges: number;
};

export interface GraphStorage {
  adjacencyTableMutable(): AdjacencyTable;
  adjacencyTable(): ReadonlyAdjacencyTable;
}

export interface IGraph extends GraphStorage {
  addNode(node: NodeLabel): boolean;
  addEdge(edge: Edge): void;
  contains(node: NodeLabel): boolean;
  nodes(): Set<NodeLabel>;
  edges(): Edge[];
}
