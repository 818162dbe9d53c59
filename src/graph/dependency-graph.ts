/**
 * Dependency Graph
 *
 * Directed acyclic graph over migration descriptors. Nodes live in a growable
 * array and are referred to by index; edges are stored as index lists in both
 * directions (dependency -> dependent). Node weights never reference each
 * other directly.
 *
 * Acyclicity is enforced on every edge insertion, so toposort() can only fail
 * if the graph has been corrupted.
 */

/**
 * Position of a node in the graph's node array
 */
export type NodeIndex = number;

/**
 * Internal graph invariant violation. Indicates a bug, never a usage error.
 */
export class GraphInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GraphInvariantError';
  }
}

/**
 * Raised by addEdge() when the edge would close a cycle
 */
export class CycleError extends Error {
  constructor(
    public readonly from: NodeIndex,
    public readonly to: NodeIndex
  ) {
    super(`Edge ${from} -> ${to} would create a cycle`);
    this.name = 'CycleError';
  }
}

/**
 * Dependency Graph
 * Edges point from a dependency to its dependent.
 */
export class DependencyGraph<T> {
  private weights: T[] = [];
  private outgoing: NodeIndex[][] = [];
  private incoming: NodeIndex[][] = [];

  /**
   * Number of nodes in the graph
   */
  get nodeCount(): number {
    return this.weights.length;
  }

  /**
   * Insert a node and return its index
   */
  addNode(weight: T): NodeIndex {
    this.weights.push(weight);
    this.outgoing.push([]);
    this.incoming.push([]);
    return this.weights.length - 1;
  }

  /**
   * Insert a directed edge from `from` (dependency) to `to` (dependent)
   *
   * @throws {CycleError} If `to` already reaches `from`; the graph is left unchanged
   */
  addEdge(from: NodeIndex, to: NodeIndex): void {
    this.assertNode(from);
    this.assertNode(to);

    if (this.outgoing[from].includes(to)) {
      return;
    }

    if (from === to || this.closesCycle(from, to)) {
      throw new CycleError(from, to);
    }

    this.outgoing[from].push(to);
    this.incoming[to].push(from);
  }

  /**
   * Get the weight stored at `index`
   */
  weight(index: NodeIndex): T {
    this.assertNode(index);
    return this.weights[index];
  }

  /**
   * Direct dependencies of a node (sources of its incoming edges)
   */
  dependencies(index: NodeIndex): NodeIndex[] {
    this.assertNode(index);
    return [...this.incoming[index]];
  }

  /**
   * Direct dependents of a node (targets of its outgoing edges)
   */
  dependents(index: NodeIndex): NodeIndex[] {
    this.assertNode(index);
    return [...this.outgoing[index]];
  }

  /**
   * Iterate over [index, weight] pairs in insertion order
   */
  *nodes(): IterableIterator<[NodeIndex, T]> {
    for (let i = 0; i < this.weights.length; i++) {
      yield [i, this.weights[i]];
    }
  }

  /**
   * Topologically sort the graph
   *
   * Depth-first post-order: roots are tried in node insertion order and each
   * node's dependencies in edge insertion order, so the result is stable for
   * a given graph.
   *
   * @returns Node indices, every dependency before its dependents
   */
  toposort(): NodeIndex[] {
    const sorted: NodeIndex[] = [];
    const visited = new Set<NodeIndex>();
    const visiting = new Set<NodeIndex>();

    // Iterative, with [node, next dependency position] frames, so long chains
    // cannot overflow the call stack
    for (let root = 0; root < this.weights.length; root++) {
      if (visited.has(root)) {
        continue;
      }

      const stack: Array<[NodeIndex, number]> = [[root, 0]];
      visiting.add(root);

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        const [index, position] = frame;
        const dependencies = this.incoming[index];

        if (position < dependencies.length) {
          frame[1] = position + 1;
          const dependency = dependencies[position];
          if (visited.has(dependency)) {
            continue;
          }
          if (visiting.has(dependency)) {
            throw new GraphInvariantError(`Dependency graph contains a cycle through node ${dependency}`);
          }
          visiting.add(dependency);
          stack.push([dependency, 0]);
        } else {
          stack.pop();
          visiting.delete(index);
          visited.add(index);
          sorted.push(index);
        }
      }
    }

    return sorted;
  }

  /**
   * Nodes reachable by following edges backward, including `index`
   */
  ancestors(index: NodeIndex): Set<NodeIndex> {
    this.assertNode(index);
    return this.collect([index], this.incoming);
  }

  /**
   * Nodes reachable by following edges forward, including `index`
   */
  descendants(index: NodeIndex): Set<NodeIndex> {
    this.assertNode(index);
    return this.collect([index], this.outgoing);
  }

  /**
   * Nodes without incoming edges (no dependencies)
   */
  sources(): NodeIndex[] {
    return this.externals(this.incoming);
  }

  /**
   * Nodes without outgoing edges (no dependents)
   */
  sinks(): NodeIndex[] {
    return this.externals(this.outgoing);
  }

  /**
   * Remove every node with an index >= `count`, and every edge touching one
   */
  truncate(count: number): void {
    if (count < 0 || count > this.weights.length) {
      throw new RangeError(`Cannot truncate graph of ${this.weights.length} nodes to ${count}`);
    }

    this.weights.length = count;
    this.outgoing.length = count;
    this.incoming.length = count;

    for (let i = 0; i < count; i++) {
      this.outgoing[i] = this.outgoing[i].filter(index => index < count);
      this.incoming[i] = this.incoming[i].filter(index => index < count);
    }
  }

  /**
   * Breadth-first reachability over the given adjacency lists
   */
  private collect(start: NodeIndex[], adjacency: NodeIndex[][]): Set<NodeIndex> {
    const reached = new Set<NodeIndex>(start);
    const queue = [...start];

    for (let head = 0; head < queue.length; head++) {
      for (const next of adjacency[queue[head]]) {
        if (!reached.has(next)) {
          reached.add(next);
          queue.push(next);
        }
      }
    }

    return reached;
  }

  /**
   * Check whether an edge `from` -> `to` would close a cycle, i.e. whether
   * `from` is reachable from `to` following edges forward
   */
  private closesCycle(from: NodeIndex, to: NodeIndex): boolean {
    // No path can leave `to` or enter `from`
    if (this.outgoing[to].length === 0 || this.incoming[from].length === 0) {
      return false;
    }

    const stack = [to];
    const seen = new Set<NodeIndex>([to]);

    while (stack.length > 0) {
      const index = stack.pop();
      if (index === undefined) {
        break;
      }
      for (const next of this.outgoing[index]) {
        if (next === from) {
          return true;
        }
        if (!seen.has(next)) {
          seen.add(next);
          stack.push(next);
        }
      }
    }

    return false;
  }

  private externals(adjacency: NodeIndex[][]): NodeIndex[] {
    const result: NodeIndex[] = [];
    for (let i = 0; i < adjacency.length; i++) {
      if (adjacency[i].length === 0) {
        result.push(i);
      }
    }
    return result;
  }

  private assertNode(index: NodeIndex): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.weights.length) {
      throw new RangeError(`Node index ${index} is out of bounds`);
    }
  }
}
