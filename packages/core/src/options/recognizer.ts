/**
 * Option recognizer: binds option tokens anywhere in the unconsumed stream.
 *
 * Non-option tokens are left in place for parameter filling.
 */

import type { Option, OptionValue, OptionValues } from "@argroute/sdk";
import { OptionError } from "@argroute/sdk";
import { createLogger } from "@argroute/shared";
import type { TokenStream } from "../stream/token-stream.js";
import { isOptionToken } from "../stream/option-token.js";
import type { OptionRegistry } from "./option-registry.js";
import { optionKey } from "./option.js";
import { coerceOptionValue } from "./coercion.js";

const logger = createLogger("OptionRecognizer");

export type RecognitionResult =
  | { success: true; values: OptionValues }
  | { success: false; error: OptionError };

function initialValues(options: readonly Option[]): Record<string, OptionValue> {
  const values: Record<string, OptionValue> = {};
  for (const option of options) {
    if (option.kind === "flag") values[optionKey(option)] = false;
  }
  return values;
}

/**
 * Scan unconsumed tokens left to right, consuming every option token and,
 * for keyed options, the value token that follows it.
 *
 * Flags not given are bound `false`; keyed options not given are absent.
 * A repeated keyed option keeps its last value.
 */
export function recognizeOptions(registry: OptionRegistry, stream: TokenStream): RecognitionResult {
  const values = initialValues(registry.options);

  for (let i = stream.nextIndex(); i !== -1; i = stream.nextIndex(i + 1)) {
    const token = stream.at(i);
    if (token === undefined || !isOptionToken(token)) continue;

    const option = registry.lookup(token);
    if (!option) {
      return { success: false, error: new OptionError({ kind: "unrecognizedOption", name: token }) };
    }

    switch (option.kind) {
      case "flag":
        stream.consume(i);
        values[optionKey(option)] = true;
        break;
      case "keyed": {
        const valueIndex = stream.nextIndex(i + 1);
        const raw = valueIndex === -1 ? undefined : stream.at(valueIndex);
        if (raw === undefined || isOptionToken(raw)) {
          return { success: false, error: new OptionError({ kind: "expectedValue", name: token }) };
        }

        const coerced = coerceOptionValue(option.valueType, raw);
        if (!coerced.success) {
          return {
            success: false,
            error: new OptionError({ kind: "invalidValue", name: token, expectedType: option.valueType, received: raw }),
          };
        }

        stream.consume(i);
        stream.consume(valueIndex);
        values[optionKey(option)] = coerced.value;
        i = valueIndex;
        break;
      }
    }
  }

  logger.debug("Recognized options", { values });
  return { success: true, values };
}
