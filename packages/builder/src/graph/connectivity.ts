/**
 * Reduce a graph to its largest strongly connected component.
 *
 * Within the retained component every junction can reach every other one,
 * which path-finding over the graph relies on.
 */

import type { DirectedEdge, EdgeId, Graph, NodeId } from "@roadnet/types";
import { NotRoutableError } from "../errors.js";
import { addToAdjacency } from "./graph-builder.js";

/** Statistics about the reduction */
export interface ConnectivityStats {
  /** Number of strongly connected components in the input */
  componentCount: number;
  /** Nodes kept */
  nodesCount: number;
  /** Edges kept */
  edgesCount: number;
  nodesDropped: number;
  edgesDropped: number;
}

export interface ConnectivityResult {
  graph: Graph;
  stats: ConnectivityStats;
}

interface VisitState {
  index: number;
  lowLink: number;
  onStack: boolean;
}

interface Frame {
  node: NodeId;
  state: VisitState;
  successors: Iterator<NodeId>;
}

function* successorsOf(graph: Graph, node: NodeId): Generator<NodeId> {
  for (const id of graph.adjacency.get(node) ?? []) {
    const edge = graph.edges.get(id);
    if (edge) yield edge.to;
  }
}

/**
 * Strongly connected components, by Tarjan's algorithm.
 *
 * The depth-first search keeps its own frame stack so large road networks
 * cannot overflow the call stack. Components come out in reverse
 * topological order of the condensation.
 */
export function stronglyConnectedComponents(graph: Graph): NodeId[][] {
  const states = new Map<NodeId, VisitState>();
  const stack: NodeId[] = [];
  const components: NodeId[][] = [];
  let nextIndex = 0;

  const callStack: Frame[] = [];
  const visit = (node: NodeId): VisitState => {
    const state: VisitState = { index: nextIndex, lowLink: nextIndex, onStack: true };
    nextIndex++;
    states.set(node, state);
    stack.push(node);
    callStack.push({ node, state, successors: successorsOf(graph, node) });
    return state;
  };

  for (const root of graph.nodes) {
    if (states.has(root)) continue;
    visit(root);

    while (callStack.length > 0) {
      const frame = callStack[callStack.length - 1];
      if (!frame) break;

      const next = frame.successors.next();
      if (!next.done) {
        const successor = states.get(next.value);
        if (!successor) {
          visit(next.value);
        } else if (successor.onStack) {
          frame.state.lowLink = Math.min(frame.state.lowLink, successor.index);
        }
        continue;
      }

      callStack.pop();
      const parent = callStack[callStack.length - 1];
      if (parent) {
        parent.state.lowLink = Math.min(parent.state.lowLink, frame.state.lowLink);
      }

      if (frame.state.lowLink === frame.state.index) {
        const component: NodeId[] = [];
        for (;;) {
          const member = stack.pop();
          if (member === undefined) break;
          const memberState = states.get(member);
          if (memberState) memberState.onStack = false;
          component.push(member);
          if (member === frame.node) break;
        }
        components.push(component);
      }
    }
  }

  return components;
}

function minNodeId(component: readonly NodeId[]): number {
  let min = Infinity;
  for (const node of component) {
    if (node < min) min = node;
  }
  return min;
}

/** Whether a component keeps any edge once the graph is reduced to it */
function keepsEdge(component: readonly NodeId[], graph: Graph | undefined): boolean {
  if (component.length > 1) return true;
  const [node] = component;
  if (node === undefined || !graph) return false;
  for (const id of graph.adjacency.get(node) ?? []) {
    if (graph.edges.get(id)?.to === node) return true;
  }
  return false;
}

/**
 * Pick the component with the most nodes. Among equal sizes a component that
 * keeps an edge (a single node only does through a self-loop) wins, then the
 * one holding the lowest node id, so the choice does not depend on traversal
 * order.
 *
 * @param graph - The graph the components came from; without it self-loops
 *   are not considered
 */
export function largestComponent(
  components: readonly (readonly NodeId[])[],
  graph?: Graph
): readonly NodeId[] | undefined {
  let best: readonly NodeId[] | undefined;
  let bestKeepsEdge = false;
  let bestMin = Infinity;
  for (const component of components) {
    const keeps = keepsEdge(component, graph);
    const min = minNodeId(component);
    const better =
      !best ||
      component.length > best.length ||
      (component.length === best.length &&
        (keeps !== bestKeepsEdge ? keeps : min < bestMin));
    if (better) {
      best = component;
      bestKeepsEdge = keeps;
      bestMin = min;
    }
  }
  return best;
}

/**
 * Keep only the largest strongly connected component and the edges between
 * its nodes. Node and edge order follow the input graph.
 *
 * @throws NotRoutableError if the graph has no edges, or no edge survives
 */
export function reduceToLargestComponent(graph: Graph): ConnectivityResult {
  if (graph.edges.size === 0) {
    throw new NotRoutableError(
      "road network has no edges and is not routable; check the source query boundaries"
    );
  }

  const components = stronglyConnectedComponents(graph);
  const retained = new Set(largestComponent(components, graph));

  const nodes = new Set<NodeId>();
  for (const node of graph.nodes) {
    if (retained.has(node)) nodes.add(node);
  }

  const edges = new Map<EdgeId, DirectedEdge>();
  const adjacency = new Map<NodeId, EdgeId[]>();
  for (const [id, edge] of graph.edges) {
    if (retained.has(edge.from) && retained.has(edge.to)) {
      edges.set(id, edge);
      addToAdjacency(adjacency, edge.from, id);
    }
  }

  if (edges.size === 0) {
    throw new NotRoutableError(
      "road network has no strongly connected components and is not routable; " +
        "check the source query boundaries"
    );
  }

  return {
    graph: { nodes, edges, adjacency },
    stats: {
      componentCount: components.length,
      nodesCount: nodes.size,
      edgesCount: edges.size,
      nodesDropped: graph.nodes.size - nodes.size,
      edgesDropped: graph.edges.size - edges.size,
    },
  };
}
