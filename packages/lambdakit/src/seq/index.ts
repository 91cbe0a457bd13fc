/**
 * lambdakit/seq
 *
 * Lazy sequence pipelines: sources, intermediate stages, terminal
 * operations and collectors.
 */

export { Seq } from "./seq";
export { Collectors, type Collector, type Holder, type Partition } from "./collectors";
export {
  DEFAULT_SEQ_OPTIONS,
  type SeqOptions,
  type SeqEvent,
  type UnboundedPolicy,
  type TerminalOperation,
  type ExhaustiveOperation,
  type ShortCircuitOperation,
  type TransformFn,
  type FilterFn,
} from "./types";
