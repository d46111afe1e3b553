/**
 * Argument manipulators: rewrite passes run once, in registration order,
 * before any stage reads meaning from the tokens.
 */

import { createLogger } from "@argroute/shared";
import type { TokenStream } from "./token-stream.js";

const logger = createLogger("Manipulators");

const SHORT_FLAG_CLUSTER = /^-[A-Za-z]{2,}$/;

export interface ArgumentManipulator {
  readonly name: string;
  /** Must be deterministic and idempotent. */
  manipulate(stream: TokenStream): void;
}

/**
 * Splits short-flag clusters: `-xyz` becomes `-x`, `-y`, `-z`. Only
 * letter clusters are split, so `-5` or `-j4` reach the recognizer whole.
 *
 * Purely syntactic; whether the letters are declared flags is decided by
 * the option recognizer.
 */
export function createOptionSplitter(): ArgumentManipulator {
  return {
    name: "option-splitter",
    manipulate(stream: TokenStream): void {
      for (let i = 0; i < stream.length; i++) {
        const token = stream.at(i);
        if (token === undefined || stream.isConsumed(i)) continue;
        if (!SHORT_FLAG_CLUSTER.test(token)) continue;

        const parts = Array.from(token.slice(1), (letter) => `-${letter}`);
        stream.split(i, parts);
        i += parts.length - 1;
      }
    },
  };
}

export function applyManipulators(manipulators: readonly ArgumentManipulator[], stream: TokenStream): void {
  for (const manipulator of manipulators) {
    manipulator.manipulate(stream);
    if (logger.isEnabled("debug")) {
      logger.debug(`Applied ${manipulator.name}`, { tokens: stream.toArray() });
    }
  }
}
