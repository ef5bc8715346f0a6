import type { GraphStats, RelationshipBasis, SchemaGraph } from '../types/schema';

const hasCycle = (graph: SchemaGraph) => {
  const adjacency = new Map<string, string[]>();
  for (const edge of graph.edges) {
    if (edge.source === edge.target) continue;
    const list = adjacency.get(edge.source) ?? [];
    list.push(edge.target);
    adjacency.set(edge.source, list);
  }

  // 0 = unvisited, 1 = on the current path, 2 = done
  const state = new Map<string, 0 | 1 | 2>();
  const visit = (node: string): boolean => {
    state.set(node, 1);
    for (const next of adjacency.get(node) ?? []) {
      const s = state.get(next) ?? 0;
      if (s === 1) return true;
      if (s === 0 && visit(next)) return true;
    }
    state.set(node, 2);
    return false;
  };

  return graph.nodes.some(node => (state.get(node.id) ?? 0) === 0 && visit(node.id));
};

export const graphStats = (graph: SchemaGraph): GraphStats => {
  const connected = new Set<string>();
  const edgesByBasis: Record<RelationshipBasis, number> = {
    DECLARED: 0,
    EXACT_MATCH: 0,
    PATTERN_MATCH: 0,
    HIERARCHICAL: 0
  };

  for (const edge of graph.edges) {
    edgesByBasis[edge.basis] += 1;
    if (edge.source === edge.target) continue;
    connected.add(edge.source);
    connected.add(edge.target);
  }

  return {
    nodeCount: graph.nodes.length,
    edgeCount: graph.edges.length,
    isolatedNodes: graph.nodes.filter(n => !connected.has(n.id)).map(n => n.id),
    hasCycle: hasCycle(graph),
    edgesByBasis
  };
};
