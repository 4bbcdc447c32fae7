// Copyright 2017 Sidewalk Labs | apache.org/licenses/LICENSE-2.0
/**
 * The road network: an undirected, distance-weighted graph over nodes 1..numNodes,
 * with all-pairs shortest distances computed once at load time.
 */

import BinaryHeap from './heap';
import { EdgeSpec, validateLoadingOptions } from './options';

/** One end of an edge, as seen from the other end. */
export interface Neighbor {
  node: number;
  km: number;
}

interface HeapEntry {
  km: number;
  node: number;
}

class RoadGraph {
  // Index 0 is unused so that nodes can index directly.
  private readonly adjacency: Neighbor[][];
  private readonly distancesKm: number[][];

  constructor(readonly numNodes: number, readonly edges: EdgeSpec[]) {
    validateLoadingOptions({ num_nodes: numNodes, edges });

    this.adjacency = [];
    for (let n = 0; n <= numNodes; n++) {
      this.adjacency.push([]);
    }
    for (const [a, b, km] of edges) {
      this.adjacency[a].push({ node: b, km });
      this.adjacency[b].push({ node: a, km });
    }

    this.distancesKm = [[]];
    for (let n = 1; n <= numNodes; n++) {
      this.distancesKm.push(this.singleSourceKm(n));
    }
  }

  /** Neighbors of a node, in edge definition order. */
  neighbors(node: number): Neighbor[] {
    return this.adjacency[node] || [];
  }

  /** Length of the shortest path between two nodes, or Infinity if they're disconnected. */
  shortestKm(from: number, to: number): number {
    const row = this.distancesKm[from];
    if (!row || row[to] === undefined) {
      return Infinity;
    }
    return row[to];
  }

  hasNode(node: number): boolean {
    return Number.isInteger(node) && node >= 1 && node <= this.numNodes;
  }

  // Dijkstra's algorithm from a single source.
  private singleSourceKm(source: number): number[] {
    const dist: number[] = [];
    for (let n = 0; n <= this.numNodes; n++) {
      dist.push(Infinity);
    }
    dist[source] = 0;

    const heap = new BinaryHeap<HeapEntry>((a, b) => a.km - b.km);
    heap.push({ km: 0, node: source });

    let entry: HeapEntry | undefined;
    while ((entry = heap.pop())) {
      const { km, node } = entry;
      if (km > dist[node]) continue;  // stale entry.
      for (const next of this.adjacency[node]) {
        const nextKm = km + next.km;
        if (nextKm < dist[next.node]) {
          dist[next.node] = nextKm;
          heap.push({ km: nextKm, node: next.node });
        }
      }
    }
    return dist;
  }
}

export default RoadGraph;
