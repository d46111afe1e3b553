/**
 * OptionRegistry: spelling lookup over the options visible to one command.
 */

import type { Option } from "@argroute/sdk";
import { ConfigurationError } from "@argroute/sdk";
import { OptionSpellingSchema, validateInput } from "@argroute/shared";
import { optionKey } from "./option.js";

export interface OptionRegistry {
  /** Options in visibility order (own first, then inherited). */
  readonly options: readonly Option[];
  lookup(spelling: string): Option | undefined;
}

/**
 * Build the lookup.
 *
 * @throws ConfigurationError on an invalid spelling, an option without
 *   spellings, or two options sharing a spelling or a key
 */
export function createOptionRegistry(options: readonly Option[]): OptionRegistry {
  const bySpelling = new Map<string, Option>();
  const byKey = new Map<string, Option>();

  for (const option of options) {
    if (option.names.length === 0) {
      throw new ConfigurationError(`Option "${option.description}" has no spellings`);
    }

    for (const name of option.names) {
      const check = validateInput(OptionSpellingSchema, name);
      if (!check.success) {
        throw new ConfigurationError(`Invalid option spelling "${name}": ${check.error}`);
      }
      if (bySpelling.has(name)) {
        throw new ConfigurationError(`Option spelling "${name}" is declared more than once`);
      }
      bySpelling.set(name, option);
    }

    const key = optionKey(option);
    if (byKey.has(key)) {
      throw new ConfigurationError(`Option key "${key}" is declared more than once`);
    }
    byKey.set(key, option);
  }

  return {
    options,
    lookup(spelling: string): Option | undefined {
      return bySpelling.get(spelling);
    },
  };
}
