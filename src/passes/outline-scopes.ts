/**
 * Scope outlining pass.
 *
 * Rewrites every outermost enter…exit span of a scope into a single region
 * node that runs an outlined child graph under the scope's params:
 * 1. Split the graph so each outermost span is its own segment
 * 2. Reconcile the output signature with the split graph
 * 3. Replace scope-body segments with region nodes, inline the rest
 * 4. Recurse into child graphs for nested spans
 * 5. Validate the result
 *
 * The input graph is never mutated.
 */

import { debugLog } from "../debug";
import { type GraphSignature, reconcileOutputs } from "../export/signature";
import type { Graph } from "../ir/graph";
import { childTarget, type InvokeNode } from "../ir/instruction";
import { nodesFilter, nodesMap } from "../ir/node-utils";
import { sequentialSplit } from "../ir/sequential-split";
import { validateGraph } from "../ir/validate";
import { type OutlineOptions, resolveOutlineOptions } from "./outline-options";
import { RegionBoundaryTracker } from "./region-boundary";
import { type OutlineDecision, outlineOrInline } from "./region-outline";
import { hasScopeMarkers } from "./scope-markers";

export type OutlineStats = {
  /** Region nodes created */
  regionsOutlined: number;
  /** Scope bodies without results whose calls were erased */
  regionsDropped: number;
  /** Ordinary segments spliced back into their parent */
  segmentsInlined: number;
};

export type OutlineResult = OutlineStats & {
  graph: Graph;
  signature: GraphSignature | undefined;
  /** Whether any graph (this one or a child) was rewritten */
  modified: boolean;
};

function emptyStats(): OutlineStats {
  return { regionsOutlined: 0, regionsDropped: 0, segmentsInlined: 0 };
}

function addStats(into: OutlineStats, from: OutlineStats): void {
  into.regionsOutlined += from.regionsOutlined;
  into.regionsDropped += from.regionsDropped;
  into.segmentsInlined += from.segmentsInlined;
}

function countDecision(stats: OutlineStats, decision: OutlineDecision | undefined): void {
  if (!decision) return;
  switch (decision.kind) {
    case "outlined":
      stats.regionsOutlined++;
      break;
    case "dropped":
      stats.regionsDropped++;
      break;
    case "inlined":
      stats.segmentsInlined++;
      break;
  }
}

/**
 * Split and rewrite the top level of `graph`. Returns the input unchanged
 * when it holds no markers of the scope.
 */
function splitAndRewrite(
  graph: Graph,
  signature: GraphSignature | undefined,
  options: OutlineOptions,
): { graph: Graph; signature: GraphSignature | undefined; stats: OutlineStats; modified: boolean } {
  const stats = emptyStats();
  if (!hasScopeMarkers(graph, options.scope)) {
    return { graph, signature, stats, modified: false };
  }

  const tracker = new RegionBoundaryTracker(options.scope);
  const split = sequentialSplit(graph, tracker.startsNewSegment);
  debugLog(
    options.debug,
    "outline",
    `split ${graph.size} instructions into ${split.childNames().length} segment(s)`,
  );

  let nextSignature: GraphSignature | undefined;
  let disposeHook = (): void => {};
  if (signature) {
    // The split renames the values feeding the output.
    nextSignature = signature.clone();
    reconcileOutputs(split, nextSignature);
    disposeHook = split.onReplace(nextSignature.replaceHook());
  }

  try {
    const invokes = nodesFilter(split.nodes(), (node): node is InvokeNode => node.op === "invoke");
    nodesMap(invokes, (node) => {
      const decision = outlineOrInline(split, node, options.scope);
      debugLog(options.debug, "outline", `${node.target}: ${decision?.kind ?? "skipped"}`);
      countDecision(stats, decision);
    });
  } finally {
    disposeHook();
  }

  return { graph: split, signature: nextSignature, stats, modified: true };
}

/**
 * Outline every scope region of `graph`, nested regions included.
 *
 * @param signature Named outputs of `graph`; a rewritten copy is returned
 */
export function outlineScopeRegions(
  graph: Graph,
  signature?: GraphSignature,
  options: Partial<OutlineOptions> = {},
): OutlineResult {
  const resolved = resolveOutlineOptions(options);
  const top = splitAndRewrite(graph, signature, resolved);
  const stats = top.stats;
  let result = top.graph;
  let modified = top.modified;

  const visited = new Set<string>();
  for (const node of result.nodes()) {
    const target = childTarget(node);
    if (target === undefined || visited.has(target)) continue;
    visited.add(target);
    const child = result.getChild(target);
    if (!child) continue;

    debugLog(resolved.debug, "outline", `recursing into ${target}`);
    const nested = outlineScopeRegions(child, undefined, { ...resolved, validate: false });
    if (!nested.modified) continue;
    if (result === graph) {
      result = graph.clone();
    }
    result.setChild(target, nested.graph);
    addStats(stats, nested);
    modified = true;
  }

  if (modified) {
    result.deleteUnusedChildren();
  }
  if (resolved.validate) {
    validateGraph(result);
  }
  return { graph: result, signature: top.signature, modified, ...stats };
}
