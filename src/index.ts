export * from "./errors";
export * from "./ir/instruction";
export { Graph, type ReplaceEvent, type ReplaceHook } from "./ir/graph";
export {
  type ArgLike,
  type BuildOptions,
  DEFAULT_SCOPE,
  GraphBuilder,
  toArg,
} from "./ir/builder";
export {
  activeScope,
  interpretGraph,
  type InterpreterOptions,
  type Operator,
  type OperatorContext,
  type RuntimeValue,
  type ScopeFrame,
} from "./ir/interpreter";
export {
  nodeInline,
  nodeReplace,
  nodesFilter,
  nodesFirst,
  nodesMap,
} from "./ir/node-utils";
export { formatInstruction, printGraph, printNodes } from "./ir/print";
export {
  SEGMENT_PREFIX,
  sequentialSplit,
  type SplitCallback,
} from "./ir/sequential-split";
export { resultArity, validateGraph } from "./ir/validate";
export {
  GraphSignature,
  type OutputArgument,
  type OutputKind,
  type OutputSpec,
  reconcileOutputs,
} from "./export/signature";
export {
  DEFAULT_OUTLINE_OPTIONS,
  type OutlineOptions,
  resolveOutlineOptions,
} from "./passes/outline-options";
export {
  type OutlineResult,
  type OutlineStats,
  outlineScopeRegions,
} from "./passes/outline-scopes";
export { type BoundaryState, RegionBoundaryTracker } from "./passes/region-boundary";
export {
  type OutlineDecision,
  outlineOrInline,
  regionSourceFn,
  replaceWithRegion,
} from "./passes/region-outline";
export {
  closes,
  hasScopeMarkers,
  isEitherMarker,
  isEnter,
  isExit,
  isOutlinedScopeBody,
} from "./passes/scope-markers";
