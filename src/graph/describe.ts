/**
 * Graph descriptions: the renderer-independent node and edge lists handed to
 * whatever draws the picture.
 */

import { DFA } from '../automata/dfa';
import { epsilonClosures } from '../automata/epsilon-closure';
import { NFA } from '../automata/nfa';
import { formatPush, PushdownAutomaton } from '../automata/pda';
import { SimulationResult, Halt } from '../automata/simulate';
import { SubsetConstruction } from '../automata/subset-construction';
import { FINAL_STATE, freshName } from '../grammar/convert';
import { RegularGrammar } from '../grammar/grammar';
import { displayLabel, InputSymbol, State } from '../symbols';

export type ModelKind = 'dfa' | 'nfa' | 'enfa' | 'pda' | 'grammar';

export interface GraphNode {
  readonly id: string;
  /** Text to draw in the node; the id unless the model says otherwise */
  readonly label: string;
  readonly isAccepting: boolean;
  readonly isStart: boolean;
  /** Set on simulation graphs: whether the run visited the node */
  readonly onPath?: boolean;
}

export interface GraphEdge {
  readonly from: string;
  readonly to: string;
  readonly label: string;
  /** Set on simulation graphs: whether the run took the edge */
  readonly onPath?: boolean;
}

export interface GraphDescription {
  readonly kind: ModelKind;
  readonly nodes: readonly GraphNode[];
  readonly edges: readonly GraphEdge[];
  /** For an ε-NFA, the closure of every state */
  readonly epsilonClosures?: Readonly<Record<State, readonly State[]>>;
}

export interface SimulationGraph extends GraphDescription {
  readonly path: readonly State[];
  readonly symbols: readonly InputSymbol[];
  readonly accepted: boolean;
  readonly halt: Halt;
}

/**
 * Collects edges, merging parallel ones (same source and target) into one
 * edge whose labels are joined in the order they were added.
 */
class EdgeList {
  private edges: Map<string, { from: string; to: string; labels: string[] }> =
    new Map();

  add(from: string, to: string, label: string) {
    const key = JSON.stringify([from, to]);
    const edge = this.edges.get(key);
    if (!edge) {
      this.edges.set(key, { from, to, labels: [label] });
    } else if (!edge.labels.includes(label)) {
      edge.labels.push(label);
    }
  }

  toArray(): GraphEdge[] {
    return [...this.edges.values()].map(({ from, to, labels }) => ({
      from,
      to,
      label: labels.join(', '),
    }));
  }
}

function node(
  id: string,
  isStart: boolean,
  isAccepting: boolean,
  label: string = id
): GraphNode {
  return { id, label, isAccepting, isStart };
}

export function describeDFA(dfa: DFA): GraphDescription {
  const edges = new EdgeList();
  for (const { from, symbol, to } of dfa.transitions()) {
    edges.add(from, to, symbol);
  }
  return {
    kind: 'dfa',
    nodes: dfa.states.map((s) => node(s, s == dfa.start, dfa.isAccepting(s))),
    edges: edges.toArray(),
  };
}

export function describeNFA(nfa: NFA): GraphDescription {
  const edges = new EdgeList();
  for (const { from, symbol, to } of nfa.transitions()) {
    for (const target of to) {
      edges.add(from, target, displayLabel(symbol));
    }
  }
  const description: GraphDescription = {
    kind: nfa.kind,
    nodes: nfa.states.map((s) => node(s, s == nfa.start, nfa.isAccepting(s))),
    edges: edges.toArray(),
  };
  if (nfa.kind == 'nfa') {
    return description;
  }
  const closures: Record<State, State[]> = {};
  for (const [state, closure] of epsilonClosures(nfa)) {
    closures[state] = closure.ordered(nfa.states);
  }
  return { ...description, epsilonClosures: closures };
}

/**
 * The DFA of a subset construction, with every node labeled by the set of
 * NFA states it stands for.
 */
export function describeSubsetConstruction(
  construction: SubsetConstruction
): GraphDescription {
  const description = describeDFA(construction.dfa);
  return {
    ...description,
    nodes: description.nodes.map((n) => {
      const composite = construction.composites.get(n.id);
      if (!composite) {
        return n;
      }
      return {
        ...n,
        label: composite.isEmpty() ? '∅' : composite.toString(),
      };
    }),
  };
}

export function describePDA(pda: PushdownAutomaton): GraphDescription {
  const edges = new EdgeList();
  for (const t of pda.transitions()) {
    edges.add(
      t.from,
      t.to,
      `${displayLabel(t.input)}, ${t.stackTop} → ${formatPush(t.push)}`
    );
  }
  return {
    kind: 'pda',
    nodes: pda.states.map((s) => node(s, s == pda.start, pda.isAccepting(s))),
    edges: edges.toArray(),
  };
}

/**
 * Variables as nodes and `V → a W` as an edge from V to W labeled a. Terminal
 * only productions lead to the same final node that the DFA conversion adds.
 */
export function describeGrammar(grammar: RegularGrammar): GraphDescription {
  const edges = new EdgeList();
  const finalNode = freshName(FINAL_STATE, new Set(grammar.variables));
  let usesFinalNode = false;
  const accepting: Set<State> = new Set();
  for (const { variable, body } of grammar.productions()) {
    switch (body.kind) {
      case 'epsilon':
        accepting.add(variable);
        break;
      case 'terminal':
        usesFinalNode = true;
        edges.add(variable, finalNode, body.terminal);
        break;
      case 'step':
        edges.add(variable, body.variable, body.terminal);
        break;
    }
  }
  const nodes = grammar.variables.map((v) =>
    node(v, v == grammar.start, accepting.has(v))
  );
  if (usesFinalNode) {
    nodes.push(node(finalNode, false, true));
  }
  return { kind: 'grammar', nodes, edges: edges.toArray() };
}

/**
 * A DFA together with one run over it. Nodes the run visited and edges it
 * took are marked `onPath`, whether or not the run accepted.
 */
export function describeSimulation(
  dfa: DFA,
  result: SimulationResult
): SimulationGraph {
  const description = describeDFA(dfa);
  const visited = new Set(result.path);
  const taken: Set<string> = new Set();
  result.consumed.forEach((_, i) => {
    taken.add(JSON.stringify([result.path[i], result.path[i + 1]]));
  });
  return {
    ...description,
    nodes: description.nodes.map((n) => ({ ...n, onPath: visited.has(n.id) })),
    edges: description.edges.map((e) => ({
      ...e,
      onPath: taken.has(JSON.stringify([e.from, e.to])),
    })),
    path: result.path,
    symbols: result.consumed,
    accepted: result.accepted,
    halt: result.halt,
  };
}
