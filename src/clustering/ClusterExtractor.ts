import type { AdjacencyList } from './types';

/**
 * Connected components of an undirected graph, found by breadth-first
 * traversal from the lowest unvisited node. Member order is traversal order;
 * callers re-sort each component.
 */
export function extractClusters(adjacency: AdjacencyList): number[][] {
  const visited = new Array<boolean>(adjacency.length).fill(false);
  const clusters: number[][] = [];

  for (let start = 0; start < adjacency.length; start++) {
    if (visited[start]) continue;

    visited[start] = true;
    const component = [start];
    // The component doubles as the BFS queue: nodes are appended in visit order
    for (let head = 0; head < component.length; head++) {
      for (const neighbor of adjacency[component[head]]) {
        if (!visited[neighbor]) {
          visited[neighbor] = true;
          component.push(neighbor);
        }
      }
    }

    clusters.push(component);
  }

  return clusters;
}
