/**
 * Option types.
 */

/** Value types a keyed option can coerce its argument to. */
export type OptionValueType = "string" | "int" | "float" | "bool";

export type OptionValue = string | number | boolean;

/** Boolean, value-less option such as `-f` / `--force`. */
export interface Flag {
  kind: "flag";
  /** Accepted spellings, including the leading dashes (e.g. ["-f", "--force"]) */
  names: readonly string[];
  description: string;
  /** Key the value is bound under. Default: longest spelling without dashes */
  key?: string;
}

/** Option that takes exactly one following value token. */
export interface KeyedOption {
  kind: "keyed";
  names: readonly string[];
  description: string;
  valueType: OptionValueType;
  key?: string;
}

export type Option = Flag | KeyedOption;

export type OptionGroupRestriction = "atMostOne" | "atLeastOne" | "exactlyOne";

/** A set of options whose combined use is constrained. */
export interface OptionGroup {
  options: readonly Option[];
  restriction: OptionGroupRestriction;
}

/** Recognized option values, keyed by option key. */
export type OptionValues = Readonly<Record<string, OptionValue>>;
