import { err, ok, type Result } from 'neverthrow';
import type { Brand } from '../../runtime/brand.js';

/**
 * Outgoing edge of a node.
 *
 * A conditional edge pairs a pure router with the label -> node table it may
 * pick from. Use `conditionalEdge()` to build one so the label set is checked
 * against the router's return type.
 */
export type Edge<S, N extends string> =
  | { readonly kind: 'direct'; readonly to: N }
  | {
      readonly kind: 'conditional';
      readonly route: (state: S) => string;
      readonly targets: Readonly<Record<string, N>>;
    };

export const directEdge = <S, N extends string>(to: N): Edge<S, N> => ({ kind: 'direct', to });

export function conditionalEdge<S, N extends string, L extends string>(
  route: (state: S) => L,
  targets: Readonly<Record<L, N>>
): Edge<S, N> {
  return { kind: 'conditional', route, targets };
}

/**
 * Static topology as written by hand. Not usable by the engine until it went
 * through `validateGraph`.
 */
export interface GraphTopology<S, N extends string> {
  readonly nodes: readonly N[];
  readonly entry: N;
  readonly terminal: N;
  readonly edges: Readonly<Partial<Record<N, Edge<S, N>>>>;
  readonly interruptBefore: readonly N[];
}

/** A topology that passed `validateGraph`: acyclic, closed, one fork at most. */
export type GraphDefinition<S, N extends string> = Brand<GraphTopology<S, N>, 'ValidatedGraph'>;

export interface GraphDefinitionError {
  readonly code: 'GRAPH_INVALID';
  readonly message: string;
  readonly issues: readonly string[];
}

export interface GraphTraversalError {
  readonly code: 'GRAPH_ROUTE_UNRESOLVED';
  readonly message: string;
  readonly from: string;
}

// -----------------------------------------------------------------------------
// Validation
// -----------------------------------------------------------------------------

export function validateGraph<S, N extends string>(
  topology: GraphTopology<S, N>
): Result<GraphDefinition<S, N>, GraphDefinitionError> {
  const issues: string[] = [];
  const known = new Set<string>(topology.nodes);

  if (known.size !== topology.nodes.length) issues.push('Node ids must be unique');
  if (!known.has(topology.entry)) issues.push(`Entry node '${topology.entry}' is not declared`);
  if (!known.has(topology.terminal)) issues.push(`Terminal node '${topology.terminal}' is not declared`);

  for (const from of Object.keys(topology.edges)) {
    if (!known.has(from)) issues.push(`Edge declared from unknown node '${from}'`);
  }

  let forks = 0;
  for (const node of topology.nodes) {
    const edge = topology.edges[node];
    if (node === topology.terminal) {
      if (edge !== undefined) issues.push(`Terminal node '${node}' must not have an outgoing edge`);
      continue;
    }
    if (edge === undefined) {
      issues.push(`Node '${node}' has no outgoing edge`);
      continue;
    }
    if (edge.kind === 'conditional') forks += 1;
    for (const target of edgeTargets(edge)) {
      if (!known.has(target)) issues.push(`Edge from '${node}' targets unknown node '${target}'`);
    }
  }
  if (forks > 1) issues.push(`Graph declares ${forks} conditional forks; at most one is supported`);

  for (const node of topology.interruptBefore) {
    if (!known.has(node)) issues.push(`Interrupt node '${node}' is not declared`);
    if (node === topology.entry) issues.push(`Entry node '${node}' cannot be an interrupt node`);
  }

  // Cycle check only makes sense on a closed graph.
  if (issues.length === 0) {
    const cycle = findCycle(topology);
    if (cycle !== null) issues.push(`Graph contains a cycle: ${cycle.join(' -> ')}`);
  }

  if (issues.length > 0) {
    return err({ code: 'GRAPH_INVALID', message: 'Invalid workflow graph', issues });
  }
  return ok(topology as GraphDefinition<S, N>);
}

function edgeTargets<S, N extends string>(edge: Edge<S, N>): readonly N[] {
  return edge.kind === 'direct' ? [edge.to] : Object.values(edge.targets);
}

/**
 * DFS with three-colour marking; a GRAY node met again closes a cycle.
 * Returns the cycle path, or null.
 */
function findCycle<S, N extends string>(topology: GraphTopology<S, N>): readonly N[] | null {
  const colour = new Map<N, 'gray' | 'black'>();
  const path: N[] = [];

  const visit = (node: N): readonly N[] | null => {
    const seen = colour.get(node);
    if (seen === 'gray') return [...path.slice(path.indexOf(node)), node];
    if (seen === 'black') return null;

    colour.set(node, 'gray');
    path.push(node);
    const edge = topology.edges[node];
    for (const next of edge === undefined ? [] : edgeTargets(edge)) {
      const cycle = visit(next);
      if (cycle !== null) return cycle;
    }
    path.pop();
    colour.set(node, 'black');
    return null;
  };

  for (const node of topology.nodes) {
    const cycle = visit(node);
    if (cycle !== null) return cycle;
  }
  return null;
}

// -----------------------------------------------------------------------------
// Traversal
// -----------------------------------------------------------------------------

/**
 * Next node after `from`, given the state the step just produced.
 * Returns null when `from` is the terminal node.
 */
export function nextNode<S, N extends string>(
  graph: GraphDefinition<S, N>,
  from: N,
  state: S
): Result<N | null, GraphTraversalError> {
  if (from === graph.terminal) return ok(null);

  const edge = graph.edges[from];
  if (edge === undefined) {
    return err({ code: 'GRAPH_ROUTE_UNRESOLVED', message: `Node '${from}' has no outgoing edge`, from });
  }
  if (edge.kind === 'direct') return ok(edge.to);

  const label = edge.route(state);
  const target: N | undefined = edge.targets[label];
  if (target === undefined) {
    return err({
      code: 'GRAPH_ROUTE_UNRESOLVED',
      message: `Condition on '${from}' returned unknown label '${label}'`,
      from,
    });
  }
  return ok(target);
}

export function isInterruptNode<S, N extends string>(graph: GraphDefinition<S, N>, node: N): boolean {
  return graph.interruptBefore.includes(node);
}
