/**
 * Positional parameter types.
 */

export interface RequiredSlot {
  kind: "required";
  name: string;
  description?: string;
}

export interface OptionalSlot {
  kind: "optional";
  name: string;
  defaultValue?: string;
  description?: string;
}

/** Collects every remaining positional token, possibly none. */
export interface VariadicSlot {
  kind: "variadic";
  name: string;
  description?: string;
}

export type ParameterSlot = RequiredSlot | OptionalSlot | VariadicSlot;

/**
 * Validated slot list: required slots, then optional slots, then at most
 * one variadic slot. Build with `createSignature` from @argroute/core.
 */
export interface ParameterSignature {
  readonly slots: readonly ParameterSlot[];
  readonly required: readonly RequiredSlot[];
  readonly optional: readonly OptionalSlot[];
  readonly variadic?: VariadicSlot;
}

export type ParameterValue = string | readonly string[] | undefined;

/** Bound positional values, keyed by slot name. */
export type ParameterValues = Readonly<Record<string, ParameterValue>>;
