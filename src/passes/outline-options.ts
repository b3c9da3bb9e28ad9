import { isDebugEnabled } from "../debug";
import { DEFAULT_SCOPE } from "../ir/builder";

/**
 * Configuration for the scope outlining pass.
 */
export type OutlineOptions = {
  /** Marker family to outline (matches enter/exit `scope`) */
  scope: string;
  /** Run the structural check on the rewritten graph */
  validate: boolean;
  /** Log split and rewrite decisions */
  debug: boolean;
};

export const DEFAULT_OUTLINE_OPTIONS: OutlineOptions = {
  scope: DEFAULT_SCOPE,
  validate: true,
  debug: false,
};

export function resolveOutlineOptions(options: Partial<OutlineOptions> = {}): OutlineOptions {
  return {
    scope: options.scope ?? DEFAULT_OUTLINE_OPTIONS.scope,
    validate: options.validate ?? DEFAULT_OUTLINE_OPTIONS.validate,
    debug: options.debug ?? (DEFAULT_OUTLINE_OPTIONS.debug || isDebugEnabled()),
  };
}
