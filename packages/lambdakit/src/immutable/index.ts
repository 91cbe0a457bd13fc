/**
 * lambdakit/immutable
 *
 * Unmodifiable collections, deep freezing and a few immutable value classes.
 */

export { listOf, copyOf, unmodifiableView, setOf, mapOf, ImmutableSet, ImmutableMap } from "./collections";
export { deepFreeze, isDeepFrozen, type DeepReadonly } from "./deep-freeze";
export { Address } from "./address";
export { Shipment, type ShipmentProps } from "./shipment";
export { Circle } from "./circle";
export { requireNonNull, requireNonNullElse, isNonNull } from "../guards";
