import type { Graph } from "../ir/graph";
import type { EnterNode, ExitNode, Instruction } from "../ir/instruction";
import { nodesFirst } from "../ir/node-utils";

export function isEnter(node: Instruction | undefined, scope: string): node is EnterNode {
  return node?.op === "enter" && node.scope === scope;
}

export function isExit(node: Instruction | undefined, scope: string): node is ExitNode {
  return node?.op === "exit" && node.scope === scope;
}

export function isEitherMarker(
  node: Instruction | undefined,
  scope: string,
): node is EnterNode | ExitNode {
  return isEnter(node, scope) || isExit(node, scope);
}

/** Whether `exit` names `enter` as the scope it closes. */
export function closes(exit: ExitNode, enter: EnterNode): boolean {
  const target = exit.args[0];
  return target?.kind === "ref" && target.id === enter.id;
}

export function hasScopeMarkers(graph: Graph, scope: string): boolean {
  return graph.nodes().some((node) => isEitherMarker(node, scope));
}

/**
 * Whether `node` calls a child graph whose first non-input instruction
 * enters `scope`, i.e. a segment holding one outlined scope region.
 */
export function isOutlinedScopeBody(
  graph: Graph,
  node: Instruction,
  scope: string,
): boolean {
  if (node.op !== "invoke") return false;
  const child = graph.getChild(node.target);
  if (!child) return false;
  // TODO: skip outlining when the enclosing scope already has the same params
  const first = nodesFirst(child.nodes(), (n) => n.op !== "input");
  return isEnter(first, scope);
}
