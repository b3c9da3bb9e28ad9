/**
 * Region boundary tracking for the sequential split.
 *
 * Consulted once per instruction in program order. Each outermost
 * enter…exit span of the tracked scope becomes exactly one segment: a new
 * segment starts at the outermost enter and again right after its exit.
 * Nested spans only move the depth and stay inside the outer segment.
 */

import { MalformedScopeNestingError } from "../errors";
import type { EnterNode, Instruction } from "../ir/instruction";
import { closes, isEnter, isExit } from "./scope-markers";

export type BoundaryState =
  | { kind: "outside" }
  | { kind: "inside"; depth: number };

export class RegionBoundaryTracker {
  private readonly openEnters: EnterNode[] = [];
  private forceNewSegment = false;

  constructor(private readonly scope: string) {}

  get state(): BoundaryState {
    return this.openEnters.length === 0
      ? { kind: "outside" }
      : { kind: "inside", depth: this.openEnters.length };
  }

  /** Split callback; bound so it can be handed to the splitter directly. */
  readonly startsNewSegment = (node: Instruction): boolean => {
    if (isEnter(node, this.scope)) {
      const outermost = this.openEnters.length === 0;
      this.openEnters.push(node);
      if (outermost) {
        this.forceNewSegment = false;
        return true;
      }
      return false;
    }

    const startsHere = this.forceNewSegment;
    this.forceNewSegment = false;

    if (isExit(node, this.scope)) {
      const top = this.openEnters.pop();
      if (!top) {
        throw new MalformedScopeNestingError(`${node.name} exits a scope that was never entered`);
      }
      if (!closes(node, top)) {
        throw new MalformedScopeNestingError(
          `${node.name} does not close the innermost open scope ${top.name}`,
        );
      }
      if (this.openEnters.length === 0) {
        // the instruction after an outermost exit opens the next segment
        this.forceNewSegment = true;
      }
    }
    return startsHere;
  };
}
