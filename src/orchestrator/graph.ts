import { WORKFLOW_GRAPH } from './transitions';
import type { Trigger, WorkflowGraph } from './transitions';
import type { State, TerminalState } from './states';
import { isStageState } from './states';

export interface GraphEdge {
  from: State;
  to: State;
  trigger: Trigger;
}

export interface GraphDescription {
  /** Stage states plus `Failed`; `Start` and `Done` appear only as edge endpoints */
  nodes: State[];
  edges: GraphEdge[];
  entry: State;
  terminals: TerminalState[];
}

export interface CompiledWorkflow {
  task: string;
  graph: GraphDescription;
  mermaid: string;
}

export function describeGraph(graph: WorkflowGraph = WORKFLOW_GRAPH): GraphDescription {
  const edges: GraphEdge[] = [];
  for (const from of graph.states) {
    for (const [trigger, to] of Object.entries(graph.transitions[from])) {
      if (to && isTrigger(trigger)) edges.push({ from, to, trigger });
    }
  }

  return {
    nodes: graph.states.filter((s) => isStageState(s) || s === 'Failed'),
    edges,
    entry: graph.entry,
    terminals: [...graph.terminals],
  };
}

const TRIGGERS: Trigger[] = ['START', 'REQUIREMENTS_OK', 'DESIGN_OK', 'STRUCTURE_OK', 'CODE_OK', 'VERIFY_RETRY', 'VERIFY_OK', 'DOCS_OK', 'FAIL'];

function isTrigger(value: string): value is Trigger {
  return TRIGGERS.some((t) => t === value);
}

/** Renders the graph as a mermaid state diagram; entry and terminals become `[*]` */
export function toMermaid(description: GraphDescription): string {
  const sentinel = (state: State): string => (state === description.entry || (description.terminals.some((t) => t === state) && !description.nodes.includes(state)) ? '[*]' : state);

  const lines = ['stateDiagram-v2'];
  for (const edge of description.edges) {
    lines.push(`    ${sentinel(edge.from)} --> ${sentinel(edge.to)}: ${edge.trigger}`);
  }
  for (const terminal of description.terminals) {
    if (description.nodes.includes(terminal)) lines.push(`    ${terminal} --> [*]`);
  }
  return `${lines.join('\n')}\n`;
}

/** Builds the graph description for a task without running any stage */
export function compileWorkflow(task: string, graph: WorkflowGraph = WORKFLOW_GRAPH): CompiledWorkflow {
  const description = describeGraph(graph);
  return { task, graph: description, mermaid: toMermaid(description) };
}
