/**
 * Sequential split
 *
 * Partitions a graph's instruction sequence into ordered segments. Each
 * non-empty segment becomes a child graph `submod_<k>`, called from a new
 * top-level graph by an `invoke` node of the same name. The input graph is
 * not mutated.
 *
 * - Graph inputs stay at the top level.
 * - A segment's inputs are the outside values it uses, in first-use order,
 *   named after those values.
 * - A segment's outputs are the values it defines that later segments or
 *   the graph output read, in definition order. A single output is returned
 *   directly; several are returned as a tuple and unpacked with getitem.
 *   A segment without outputs has no output instruction.
 */

import { GraphMutationError } from "../errors";
import { Graph } from "./graph";
import {
  type Arg,
  cloneMeta,
  type GetItemNode,
  type InputNode,
  type Instruction,
  type InvokeNode,
  mapRefs,
  type NodeId,
  type OutputNode,
  ref,
  refsOf,
  tuple,
} from "./instruction";

/** Returns true when a new segment must start at `node`. */
export type SplitCallback = (node: Instruction) => boolean;

export const SEGMENT_PREFIX = "submod_";

export function sequentialSplit(graph: Graph, startsNewSegment: SplitCallback): Graph {
  const nodes = graph.nodes();

  const segmentOf = new Map<NodeId, number>();
  let segmentId = 0;
  for (const node of nodes) {
    if (startsNewSegment(node)) {
      segmentId += 1;
    }
    segmentOf.set(node.id, segmentId);
  }

  const segments = new Map<number, Instruction[]>();
  for (const node of nodes) {
    if (node.op === "input" || node.op === "output") continue;
    const id = segmentOf.get(node.id) ?? 0;
    const members = segments.get(id);
    if (members) {
      members.push(node);
    } else {
      segments.set(id, [node]);
    }
  }

  // Which segments read each value, and which values the graph output reads.
  const readers = new Map<NodeId, Set<number>>();
  const readByOutput = new Set<NodeId>();
  for (const node of nodes) {
    for (const id of refsOf(node.args)) {
      if (node.op === "output") {
        readByOutput.add(id);
        continue;
      }
      const set = readers.get(id) ?? new Set<number>();
      set.add(segmentOf.get(node.id) ?? 0);
      readers.set(id, set);
    }
  }

  const result = new Graph();
  const env = new Map<NodeId, Arg>();
  const resolve = (id: NodeId): Arg => {
    const value = env.get(id);
    if (!value) {
      throw new GraphMutationError(
        `sequential split: ${graph.get(id).name} is used before it is defined`,
      );
    }
    return value;
  };

  for (const node of nodes) {
    if (node.op !== "input") continue;
    const copy = result.insertCopy(node, []);
    env.set(node.id, ref(copy.id));
  }

  const orderedIds = Array.from(segments.keys()).sort((a, b) => a - b);
  for (const id of orderedIds) {
    const members = segments.get(id) ?? [];
    const memberIds = new Set(members.map((node) => node.id));

    const child = new Graph();
    const childEnv = new Map<NodeId, Arg>();
    const captured: NodeId[] = [];
    for (const node of members) {
      for (const used of refsOf(node.args)) {
        if (memberIds.has(used) || childEnv.has(used)) continue;
        const source = graph.get(used);
        const input = child.insert(
          source.name,
          (at): InputNode => ({ ...at, op: "input", args: [], meta: cloneMeta(source.meta) }),
        );
        childEnv.set(used, ref(input.id));
        captured.push(used);
      }
    }

    for (const node of members) {
      const args = mapRefs(node.args, (used) => {
        const value = childEnv.get(used);
        if (!value) {
          throw new GraphMutationError(
            `sequential split: no binding for ${graph.get(used).name}`,
          );
        }
        return value;
      });
      const copy = child.insertCopy(node, args);
      if (copy.op === "invoke" || copy.op === "subgraph") {
        copy.target = child.adoptChild(copy.target, graph.requireChild(copy.target).clone());
      }
      childEnv.set(node.id, ref(copy.id));
    }

    const outputs = members.filter((node) => {
      if (readByOutput.has(node.id)) return true;
      const readBy = readers.get(node.id);
      return readBy !== undefined && Array.from(readBy).some((reader) => reader !== id);
    });
    if (outputs.length > 0) {
      const values = outputs.map((node) => {
        const value = childEnv.get(node.id);
        if (!value) {
          throw new GraphMutationError(`sequential split: no binding for ${node.name}`);
        }
        return value;
      });
      child.insert(
        "output",
        (at): OutputNode => ({
          ...at,
          op: "output",
          args: [values.length === 1 ? values[0] : tuple(values)],
          meta: {},
        }),
      );
    }

    const target = result.adoptChild(`${SEGMENT_PREFIX}${id}`, child);
    const invoke = result.insert(
      target,
      (at): InvokeNode => ({
        ...at,
        op: "invoke",
        target,
        args: captured.map(resolve),
        meta: outputs.length === 1 ? cloneMeta(outputs[0].meta) : {},
      }),
    );

    if (outputs.length === 1) {
      env.set(outputs[0].id, ref(invoke.id));
    } else {
      outputs.forEach((node, index) => {
        const item = result.insert(
          "getitem",
          (at): GetItemNode => ({
            ...at,
            op: "getitem",
            index,
            args: [ref(invoke.id)],
            meta: cloneMeta(node.meta),
          }),
        );
        env.set(node.id, ref(item.id));
      });
    }
  }

  const output = graph.output();
  if (output) {
    result.insertCopy(output, mapRefs(output.args, resolve));
  }
  return result;
}
