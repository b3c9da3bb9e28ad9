/**
 * Region outlining.
 *
 * Turns a call to a segment that holds one scope region into a single
 * region node carrying the scope params, and inlines every other segment
 * back into its parent.
 */

import {
  IncompleteScopeBlockError,
  MalformedScopeNestingError,
  UnsupportedOutputShapeError,
} from "../errors";
import type { Graph } from "../ir/graph";
import {
  type Arg,
  cloneMeta,
  cloneValueMeta,
  type EnterNode,
  type ExitNode,
  type Instruction,
  type InvokeNode,
  type NodeMeta,
  ref,
  type RegionNode,
  type SubgraphNode,
  type ValueMeta,
} from "../ir/instruction";
import { nodeInline, nodeReplace, nodesFilter } from "../ir/node-utils";
import { closes, isEitherMarker, isEnter, isExit, isOutlinedScopeBody } from "./scope-markers";

export type OutlineDecision =
  | { kind: "outlined"; region: RegionNode; body: SubgraphNode }
  | { kind: "dropped"; target: string }
  | { kind: "inlined"; target: string };

/** Display and qualified name recorded on region nodes. */
export function regionSourceFn(scope: string): [string, string] {
  return [`wrap_with_${scope}`, `ScopeRegion.wrap_with_${scope}`];
}

function memberOf(body: Graph, item: Arg): Instruction {
  if (item.kind !== "ref") {
    throw new UnsupportedOutputShapeError(`tuple member ${item.kind}`);
  }
  return body.get(item.id);
}

/**
 * An exit returned from the body stands for the value computed last inside
 * the scope; point its uses there so the exit can be erased.
 */
function forwardExitResult(body: Graph, exit: ExitNode): void {
  if (body.users(exit.id).length === 0) return;
  const nodes = body.nodes();
  const before = nodes.slice(0, body.indexOf(exit.id));
  const result = before
    .reverse()
    .find((node) => node.op !== "input" && node.op !== "enter" && node.op !== "exit");
  if (!result) {
    throw new UnsupportedOutputShapeError("exit");
  }
  body.replaceAllUsesWith(exit.id, ref(result.id));
}

/**
 * Replace `invoke` (a call to an outlined scope body) with a region node.
 * The body's enter and exit markers are removed from the child graph.
 */
export function replaceWithRegion(
  graph: Graph,
  invoke: InvokeNode,
  scope: string,
): OutlineDecision {
  const body = graph.requireChild(invoke.target);
  const markers = nodesFilter(body.nodes(), (node) => isEitherMarker(node, scope));
  if (markers.length < 2) {
    throw new IncompleteScopeBlockError(
      `${invoke.target} holds ${markers.length} ${scope} marker(s); an enter and an exit are required`,
    );
  }
  const open: EnterNode[] = [];
  for (const marker of markers) {
    if (isEnter(marker, scope)) {
      open.push(marker);
      continue;
    }
    if (!isExit(marker, scope)) continue;
    const top = open.pop();
    if (!top || !closes(marker, top)) {
      throw new MalformedScopeNestingError(
        `${invoke.target}: ${marker.name} does not close the innermost open scope`,
      );
    }
  }
  if (open.length > 0) {
    throw new IncompleteScopeBlockError(
      `${invoke.target}: ${open.map((node) => node.name).join(", ")} never exited`,
    );
  }
  const enter = markers[0];
  const exit = markers[markers.length - 1];
  if (!isEnter(enter, scope) || !isExit(exit, scope) || !closes(exit, enter)) {
    throw new MalformedScopeNestingError(
      `${invoke.target}: ${exit.name} does not close ${enter.name}`,
    );
  }
  forwardExitResult(body, exit);

  const moduleStack = { ...(enter.meta.moduleStack ?? {}) };
  const output = body.output();
  const value = output?.args[0];

  let decision: OutlineDecision;
  if (value === undefined) {
    // The body returns nothing, so the call has no observable result.
    graph.erase(invoke.id);
    decision = { kind: "dropped", target: invoke.target };
  } else {
    if (value.kind === "const") {
      throw new UnsupportedOutputShapeError(value.kind);
    }
    const bodyRef = graph.insert(
      `${scope}_body`,
      (at): SubgraphNode => ({
        ...at,
        op: "subgraph",
        target: invoke.target,
        args: [],
        meta: { moduleStack: { ...moduleStack } },
      }),
      invoke.id,
    );
    const args = [ref(bodyRef.id), ...invoke.args];
    const insertRegion = (name: string, meta: NodeMeta): RegionNode =>
      graph.insert(
        name,
        (at): RegionNode => ({
          ...at,
          op: "region",
          scope,
          params: enter.params.slice(),
          args,
          meta,
        }),
        invoke.id,
      );

    let region: RegionNode;
    if (value.kind === "tuple") {
      const members = value.items.map((item) => memberOf(body, item));
      const vals = members.map((member) => member.meta.val);
      const meta: NodeMeta = { moduleStack, sourceFn: regionSourceFn(scope) };
      if (vals.every((val): val is ValueMeta => val !== undefined)) {
        meta.val = vals.map(cloneValueMeta);
      }
      region = insertRegion(`${scope}_region`, meta);
      nodeReplace(graph, invoke, region, { deleteOld: true });

      // Results keep the names and metadata they had inside the body.
      for (const user of graph.users(region.id)) {
        if (user.op !== "getitem") continue;
        const member = members[user.index];
        graph.rename(user.id, member.name);
        graph.setMeta(user.id, cloneMeta(member.meta));
      }
    } else {
      const member = body.get(value.id);
      region = insertRegion(member.name, {
        ...cloneMeta(member.meta),
        moduleStack,
        sourceFn: regionSourceFn(scope),
      });
      nodeReplace(graph, invoke, region, { deleteOld: true });
    }
    decision = { kind: "outlined", region, body: bodyRef };
  }

  body.erase(exit.id);
  body.erase(enter.id);
  return decision;
}

/**
 * Outline `node` if it calls a scope body, otherwise inline the segment it
 * calls. Instructions other than invokes are left alone.
 */
export function outlineOrInline(
  graph: Graph,
  node: Instruction,
  scope: string,
): OutlineDecision | undefined {
  if (node.op !== "invoke") {
    return undefined;
  }
  if (isOutlinedScopeBody(graph, node, scope)) {
    return replaceWithRegion(graph, node, scope);
  }
  nodeInline(graph, node);
  return { kind: "inlined", target: node.target };
}
