import { GraphDescription, GraphEdge, GraphNode } from './describe';

function quote(s: string) {
  return `"${s.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function nodeLine(node: GraphNode) {
  const attrs = [node.isAccepting ? 'shape=doublecircle' : 'shape=circle'];
  if (node.label != node.id) {
    attrs.push(`label=${quote(node.label)}`);
  }
  if (node.isStart) {
    attrs.push('style=filled', 'fillcolor=lightblue');
  }
  if (node.onPath) {
    attrs.push('color=red');
  }
  return `  ${quote(node.id)} [${attrs.join(', ')}];`;
}

function edgeLine(edge: GraphEdge) {
  const attrs = [`label=${quote(edge.label)}`];
  if (edge.onPath) {
    attrs.push('color=red', 'penwidth=2');
  }
  return `  ${quote(edge.from)} -> ${quote(edge.to)} [${attrs.join(', ')}];`;
}

/**
 * Graphviz source for a graph description: accepting states are double
 * circles, the start state is filled light blue and anything on a
 * simulated path is red.
 */
export function toDot(description: GraphDescription): string {
  const lines = [`digraph ${description.kind} {`, '  rankdir=LR;'];
  lines.push(...description.nodes.map(nodeLine));
  lines.push(...description.edges.map(edgeLine));
  lines.push('}');
  return lines.join('\n') + '\n';
}
