/**
 * Structural consistency check for graphs and their children.
 *
 * Checks:
 * - unique names
 * - every reference resolves to an instruction defined earlier
 * - at most one output, and it is the last instruction
 * - child graphs referenced by invoke/subgraph/region exist
 * - call arity against the child's inputs
 * - getitem indices against the producer's known result arity
 */

import { GraphValidationError } from "../errors";
import type { Graph } from "./graph";
import { type Instruction, type NodeId, refsOf } from "./instruction";

export function validateGraph(graph: Graph, path = "graph"): void {
  const nodes = graph.nodes();
  const defined = new Set<NodeId>();
  const names = new Set<string>();
  let outputs = 0;

  nodes.forEach((node, index) => {
    const where = `${path}.${node.name}`;
    if (names.has(node.name)) {
      throw new GraphValidationError(`${where}: duplicate name`);
    }
    names.add(node.name);

    for (const id of refsOf(node.args)) {
      if (!graph.has(id)) {
        throw new GraphValidationError(`${where}: references missing node ${id}`);
      }
      if (!defined.has(id)) {
        throw new GraphValidationError(
          `${where}: uses ${graph.get(id).name} before it is defined`,
        );
      }
    }

    switch (node.op) {
      case "output":
        outputs++;
        if (index !== nodes.length - 1) {
          throw new GraphValidationError(`${where}: output must be the last instruction`);
        }
        if (node.args.length > 1) {
          throw new GraphValidationError(`${where}: output takes at most one argument`);
        }
        break;
      case "subgraph":
        requireChild(graph, node.target, where);
        break;
      case "invoke":
        checkCallArity(requireChild(graph, node.target, where), node.args.length, where);
        break;
      case "region": {
        const body = node.args[0];
        const bodyNode = body?.kind === "ref" ? graph.get(body.id) : undefined;
        if (bodyNode?.op !== "subgraph") {
          throw new GraphValidationError(`${where}: region must reference a subgraph first`);
        }
        checkCallArity(
          requireChild(graph, bodyNode.target, where),
          node.args.length - 1,
          where,
        );
        break;
      }
      case "getitem": {
        const source = node.args[0];
        if (source?.kind !== "ref") {
          throw new GraphValidationError(`${where}: getitem needs a node source`);
        }
        const arity = resultArity(graph, graph.get(source.id));
        if (arity !== undefined && (node.index < 0 || node.index >= arity)) {
          throw new GraphValidationError(
            `${where}: index ${node.index} out of range for ${arity} results`,
          );
        }
        break;
      }
      case "input":
      case "call":
      case "enter":
      case "exit":
        break;
    }
    defined.add(node.id);
  });

  if (outputs > 1) {
    throw new GraphValidationError(`${path}: ${outputs} output instructions`);
  }

  for (const name of graph.childNames()) {
    validateGraph(graph.requireChild(name), `${path}.${name}`);
  }
}

/**
 * Number of results `node` produces, when statically known.
 */
export function resultArity(graph: Graph, node: Instruction): number | undefined {
  if (node.op === "invoke") {
    const child = graph.getChild(node.target);
    const value = child?.output()?.args[0];
    if (!child) return undefined;
    if (value === undefined) return 0;
    return value.kind === "tuple" ? value.items.length : 1;
  }
  if (node.op === "region" && Array.isArray(node.meta.val)) {
    return node.meta.val.length;
  }
  return undefined;
}

function requireChild(graph: Graph, target: string, where: string): Graph {
  const child = graph.getChild(target);
  if (!child) {
    throw new GraphValidationError(`${where}: missing child graph ${target}`);
  }
  return child;
}

function checkCallArity(child: Graph, argCount: number, where: string): void {
  const inputs = child.nodes().filter((n) => n.op === "input").length;
  if (inputs !== argCount) {
    throw new GraphValidationError(
      `${where}: passes ${argCount} arguments to a graph with ${inputs} inputs`,
    );
  }
}
