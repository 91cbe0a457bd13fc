/**
 * lambdakit/seq - Types
 *
 * Function shapes used by sequence stages, the options object a Seq carries,
 * and the events it reports through `onEvent`.
 */

// =============================================================================
// Stage Function Types
// =============================================================================

/**
 * Per-element transformation. `index` counts elements seen by this stage.
 */
export type TransformFn<T, U> = (item: T, index: number) => U;

/**
 * Per-element test. `index` counts elements seen by this stage.
 */
export type FilterFn<T> = (item: T, index: number) => boolean;

// =============================================================================
// Terminal Operations
// =============================================================================

/**
 * Terminal operations that must drain the whole sequence.
 */
export type ExhaustiveOperation =
  | "toArray"
  | "collect"
  | "forEach"
  | "count"
  | "reduce"
  | "min"
  | "max"
  | "join"
  | "sorted";

/**
 * Terminal operations that may stop early.
 */
export type ShortCircuitOperation = "findFirst" | "anyMatch" | "allMatch" | "noneMatch";

export type TerminalOperation = ExhaustiveOperation | ShortCircuitOperation;

// =============================================================================
// Events
// =============================================================================

/**
 * Events emitted while a terminal operation runs.
 *
 * `pulled` counts elements taken from the root source, before any stage.
 */
export type SeqEvent =
  | { type: "seq_terminal_start"; operation: TerminalOperation }
  | { type: "seq_terminal_complete"; operation: TerminalOperation; pulled: number; durationMs: number }
  | { type: "seq_terminal_error"; operation: TerminalOperation; pulled: number; error: unknown }
  | { type: "seq_unbounded"; operation: ExhaustiveOperation; policy: Exclude<UnboundedPolicy, "throw"> };

// =============================================================================
// Options
// =============================================================================

/**
 * What an exhaustive operation does on a sequence with no limit:
 * - `"throw"`: throw UnboundedSequenceError before pulling anything
 * - `"warn"`: warn (outside production), emit `seq_unbounded`, then run
 * - `"ignore"`: run; the caller guarantees the sequence ends
 */
export type UnboundedPolicy = "throw" | "warn" | "ignore";

export interface SeqOptions {
  /** Receives terminal operation events */
  onEvent?: (event: SeqEvent) => void;
  unboundedPolicy: UnboundedPolicy;
}

export const DEFAULT_SEQ_OPTIONS: Readonly<SeqOptions> = Object.freeze({
  unboundedPolicy: "throw",
});
