/**
 * Named output specification for an exported graph.
 *
 * Each entry pairs a declared output with the name of the graph value that
 * produces it. Rewrites that rename or replace those values keep the entries
 * in sync through the graph's replace hooks.
 */

import { OutputSpecificationMismatchError } from "../errors";
import type { Graph, ReplaceHook } from "../ir/graph";
import type { Arg } from "../ir/instruction";

export type OutputKind = "user_output" | "loss_output" | "buffer_mutation";

export type OutputArgument =
  | { kind: "value"; name: string }
  | { kind: "none" };

export type OutputSpec = {
  kind: OutputKind;
  /** Externally visible name of the output */
  label: string;
  arg: OutputArgument;
};

export class GraphSignature {
  readonly outputSpecs: OutputSpec[];

  constructor(outputSpecs: OutputSpec[]) {
    this.outputSpecs = outputSpecs;
  }

  static userOutputs(entries: Array<[label: string, name: string | null]>): GraphSignature {
    return new GraphSignature(
      entries.map(([label, name]) => ({
        kind: "user_output",
        label,
        arg: name === null ? { kind: "none" } : { kind: "value", name },
      })),
    );
  }

  clone(): GraphSignature {
    return new GraphSignature(
      this.outputSpecs.map((spec) => ({ ...spec, arg: { ...spec.arg } })),
    );
  }

  /** Value name currently producing output `label`. */
  valueFor(label: string): string | undefined {
    const spec = this.outputSpecs.find((s) => s.label === label);
    return spec?.arg.kind === "value" ? spec.arg.name : undefined;
  }

  replaceAllUses(oldName: string, newName: string): void {
    for (const spec of this.outputSpecs) {
      if (spec.arg.kind === "value" && spec.arg.name === oldName) {
        spec.arg.name = newName;
      }
    }
  }

  /** Graph hook keeping entries in sync when an output value changes. */
  replaceHook(): ReplaceHook {
    return ({ oldName, newName, user }) => {
      if (user.op === "output" && newName !== null) {
        this.replaceAllUses(oldName, newName);
      }
    };
  }
}

function outputValues(value: Arg | undefined): Arg[] {
  if (value === undefined) return [];
  return value.kind === "tuple" ? value.items : [value];
}

/**
 * Point each signature entry at the value the graph output now returns in
 * its position. Empty results must stay empty; entries for other constants
 * are left as they are.
 */
export function reconcileOutputs(graph: Graph, signature: GraphSignature): void {
  const output = graph.output();
  if (!output) {
    throw new OutputSpecificationMismatchError("graph has no output instruction");
  }
  const values = outputValues(output.args[0]);
  if (values.length !== signature.outputSpecs.length) {
    throw new OutputSpecificationMismatchError(
      `graph returns ${values.length} values but the signature declares ${signature.outputSpecs.length}`,
    );
  }

  values.forEach((value, index) => {
    const spec = signature.outputSpecs[index];
    if (value.kind === "ref") {
      if (spec.arg.kind !== "value") {
        throw new OutputSpecificationMismatchError(
          `output ${spec.label} is declared empty but returns a value`,
        );
      }
      spec.arg.name = graph.get(value.id).name;
      return;
    }
    if (value.kind === "const" && value.value === null) {
      if (spec.arg.kind !== "none") {
        throw new OutputSpecificationMismatchError(
          `output ${spec.label} returns nothing but names ${spec.arg.name}`,
        );
      }
      return;
    }
    if (value.kind === "const") {
      // Constant results have no producing node to follow.
      return;
    }
    throw new OutputSpecificationMismatchError(
      `output ${spec.label} returns a nested tuple`,
    );
  });
}
