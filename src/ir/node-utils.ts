import { GraphMutationError } from "../errors";
import type { Graph } from "./graph";
import {
  type Arg,
  type Instruction,
  type InvokeNode,
  mapArg,
  mapRefs,
  type NodeId,
  ref,
} from "./instruction";

export function nodesFilter<T extends Instruction>(
  nodes: readonly Instruction[],
  predicate: (node: Instruction) => node is T,
): T[];
export function nodesFilter(
  nodes: readonly Instruction[],
  predicate: (node: Instruction) => boolean,
): Instruction[];
export function nodesFilter(
  nodes: readonly Instruction[],
  predicate: (node: Instruction) => boolean,
): Instruction[] {
  return nodes.filter(predicate);
}

export function nodesFirst(
  nodes: readonly Instruction[],
  predicate: (node: Instruction) => boolean,
): Instruction | undefined {
  return nodes.find(predicate);
}

/**
 * Apply `fn` to each node of a snapshot. Callers pass a list taken before
 * mutation starts, so `fn` may freely rewrite the owning graph.
 */
export function nodesMap<N extends Instruction, R>(
  nodes: readonly N[],
  fn: (node: N) => R,
): R[] {
  return nodes.map((node) => fn(node));
}

export function nodeReplace(
  graph: Graph,
  oldNode: Instruction,
  newNode: Instruction,
  options: { deleteOld?: boolean } = {},
): void {
  graph.replaceAllUsesWith(oldNode.id, ref(newNode.id));
  if (options.deleteOld) {
    graph.erase(oldNode.id);
  }
}

function lookup(env: Map<NodeId, Arg>, id: NodeId, context: string): Arg {
  const value = env.get(id);
  if (!value) {
    throw new GraphMutationError(`${context}: node ${id} has no binding`);
  }
  return value;
}

/**
 * Splice the child graph called by `invoke` back into `graph` in place of
 * the call. Child inputs bind to the call arguments; body instructions keep
 * their names; users of the call (directly, or through getitem) are rewired
 * to the copied results. Children left unreferenced afterwards are dropped.
 */
export function nodeInline(graph: Graph, invoke: InvokeNode): void {
  const child = graph.requireChild(invoke.target);
  const context = `inline ${invoke.name}`;
  const env = new Map<NodeId, Arg>();
  const childNodes = child.nodes();

  const inputs = childNodes.filter((node) => node.op === "input");
  if (inputs.length !== invoke.args.length) {
    throw new GraphMutationError(
      `${context}: ${invoke.args.length} arguments for ${inputs.length} inputs`,
    );
  }
  inputs.forEach((input, i) => env.set(input.id, invoke.args[i]));

  for (const node of childNodes) {
    if (node.op === "input" || node.op === "output") continue;
    const args = mapRefs(node.args, (id) => lookup(env, id, context));
    const copy = graph.insertCopy(node, args, invoke.id);
    if (copy.op === "invoke" || copy.op === "subgraph") {
      const target = graph.adoptChild(copy.target, child.requireChild(copy.target));
      copy.target = target;
    }
    env.set(node.id, ref(copy.id));
  }

  const result = child.output()?.args[0];
  if (result?.kind === "tuple") {
    for (const user of graph.users(invoke.id)) {
      if (user.op !== "getitem") continue;
      const item = result.items[user.index];
      if (!item) {
        throw new GraphMutationError(`${context}: no result at index ${user.index}`);
      }
      graph.replaceAllUsesWith(user.id, mapArg(item, (id) => lookup(env, id, context)));
      graph.erase(user.id);
    }
  } else if (result !== undefined) {
    graph.replaceAllUsesWith(invoke.id, mapArg(result, (id) => lookup(env, id, context)));
  }
  graph.erase(invoke.id);
  graph.deleteUnusedChildren();
}
