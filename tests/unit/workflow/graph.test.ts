import { describe, expect, it } from 'vitest';
import {
  conditionalEdge,
  directEdge,
  isInterruptNode,
  nextNode,
  validateGraph,
  type GraphTopology,
} from '../../../src/domain/workflow/graph.js';
import { loadRecipeGraph } from '../../../src/domain/workflow/recipe-graph.js';
import { initialWorkflowState } from '../../../src/domain/workflow/state.js';
import { expectErr, expectOk } from '../../helpers/result-helpers.js';

type Flag = { readonly flag: boolean };
type N = 'a' | 'b' | 'c';

const route = (s: Flag): 'yes' | 'no' => (s.flag ? 'yes' : 'no');

function topology(overrides: Partial<GraphTopology<Flag, N>> = {}): GraphTopology<Flag, N> {
  return {
    nodes: ['a', 'b', 'c'],
    entry: 'a',
    terminal: 'c',
    edges: {
      a: conditionalEdge<Flag, N, 'yes' | 'no'>(route, { yes: 'b', no: 'c' }),
      b: directEdge<Flag, N>('c'),
    },
    interruptBefore: ['b'],
    ...overrides,
  };
}

describe('validateGraph', () => {
  it('accepts the recipe graph', () => {
    const graph = expectOk(loadRecipeGraph(), 'recipe graph');
    expect(graph.entry).toBe('generate');
    expect(graph.terminal).toBe('finalize');
    expect(graph.interruptBefore).toEqual(['awaitFeedback']);
  });

  it('accepts a well-formed topology', () => {
    expectOk(validateGraph(topology()), 'valid topology');
  });

  it('rejects an edge to an undeclared node', () => {
    const error = expectErr(
      validateGraph<Flag, string>({
        nodes: ['a', 'b', 'c'],
        entry: 'a',
        terminal: 'c',
        edges: { a: directEdge('b'), b: directEdge('x') },
        interruptBefore: [],
      }),
      'unknown target'
    );
    expect(error.code).toBe('GRAPH_INVALID');
    expect(error.issues).toEqual(["Edge from 'b' targets unknown node 'x'"]);
  });

  it('rejects a node without an outgoing edge', () => {
    const error = expectErr(validateGraph(topology({ edges: { a: directEdge('b') } })), 'missing edge');
    expect(error.issues).toEqual(["Node 'b' has no outgoing edge"]);
  });

  it('rejects an outgoing edge on the terminal node', () => {
    const error = expectErr(
      validateGraph(topology({ edges: { a: directEdge('b'), b: directEdge('c'), c: directEdge('a') } })),
      'terminal edge'
    );
    expect(error.issues).toEqual(["Terminal node 'c' must not have an outgoing edge"]);
  });

  it('rejects more than one conditional fork', () => {
    const error = expectErr(
      validateGraph(
        topology({
          edges: {
            a: conditionalEdge<Flag, N, 'yes' | 'no'>(route, { yes: 'b', no: 'c' }),
            b: conditionalEdge<Flag, N, 'yes' | 'no'>(route, { yes: 'c', no: 'c' }),
          },
        })
      ),
      'two forks'
    );
    expect(error.issues).toEqual(['Graph declares 2 conditional forks; at most one is supported']);
  });

  it('rejects an interrupt on the entry node', () => {
    const error = expectErr(validateGraph(topology({ interruptBefore: ['a'] })), 'entry interrupt');
    expect(error.issues).toEqual(["Entry node 'a' cannot be an interrupt node"]);
  });

  it('rejects duplicate node ids', () => {
    const error = expectErr(validateGraph(topology({ nodes: ['a', 'b', 'b', 'c'] })), 'duplicates');
    expect(error.issues).toContain('Node ids must be unique');
  });

  it('reports the path of a cycle', () => {
    const error = expectErr(
      validateGraph(
        topology({
          edges: {
            a: directEdge('b'),
            b: conditionalEdge<Flag, N, 'yes' | 'no'>(route, { yes: 'a', no: 'c' }),
          },
          interruptBefore: [],
        })
      ),
      'cycle'
    );
    expect(error.issues).toEqual(['Graph contains a cycle: a -> b -> a']);
  });
});

describe('nextNode', () => {
  const graph = expectOk(loadRecipeGraph(), 'recipe graph');

  it('routes generate to awaitFeedback when review is needed', () => {
    const state = { ...initialWorkflowState('x'), needsReview: true };
    expect(expectOk(nextNode(graph, 'generate', state), 'route')).toBe('awaitFeedback');
  });

  it('routes generate straight to finalize otherwise', () => {
    expect(expectOk(nextNode(graph, 'generate', initialWorkflowState('x')), 'route')).toBe('finalize');
  });

  it('follows the direct edge out of awaitFeedback', () => {
    expect(expectOk(nextNode(graph, 'awaitFeedback', initialWorkflowState('x')), 'route')).toBe('finalize');
  });

  it('returns null after the terminal node', () => {
    expect(expectOk(nextNode(graph, 'finalize', initialWorkflowState('x')), 'route')).toBeNull();
  });

  it('fails when a router returns a label with no target', () => {
    const loose = expectOk(
      validateGraph<Flag, N>({
        nodes: ['a', 'b', 'c'],
        entry: 'a',
        terminal: 'c',
        edges: { a: { kind: 'conditional', route: () => 'other', targets: { yes: 'b' } }, b: directEdge('c') },
        interruptBefore: [],
      }),
      'loose graph'
    );
    const error = expectErr(nextNode(loose, 'a', { flag: true }), 'unknown label');
    expect(error).toEqual({
      code: 'GRAPH_ROUTE_UNRESOLVED',
      message: "Condition on 'a' returned unknown label 'other'",
      from: 'a',
    });
  });

  it('knows which nodes pause execution', () => {
    expect(isInterruptNode(graph, 'awaitFeedback')).toBe(true);
    expect(isInterruptNode(graph, 'finalize')).toBe(false);
  });
});
