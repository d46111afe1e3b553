/**
 * Parameter signatures: ordered positional slots.
 */

import type {
  OptionalSlot,
  ParameterSignature,
  ParameterSlot,
  RequiredSlot,
  VariadicSlot,
} from "@argroute/sdk";
import { ConfigurationError } from "@argroute/sdk";

export function required(name: string, description?: string): RequiredSlot {
  return description === undefined ? { kind: "required", name } : { kind: "required", name, description };
}

export function optional(name: string, defaultValue?: string, description?: string): OptionalSlot {
  const slot: OptionalSlot = { kind: "optional", name };
  if (defaultValue !== undefined) slot.defaultValue = defaultValue;
  if (description !== undefined) slot.description = description;
  return slot;
}

export function variadic(name: string, description?: string): VariadicSlot {
  return description === undefined ? { kind: "variadic", name } : { kind: "variadic", name, description };
}

/**
 * Validate and index a slot list.
 *
 * @throws ConfigurationError when a required slot follows an optional or
 *   variadic slot, when a variadic slot is not last, or when two slots share
 *   a name
 */
export function createSignature(slots: readonly ParameterSlot[]): ParameterSignature {
  const names = new Set<string>();
  const requiredSlots: RequiredSlot[] = [];
  const optionalSlots: OptionalSlot[] = [];
  let variadicSlot: VariadicSlot | undefined;

  for (const [index, slot] of slots.entries()) {
    if (names.has(slot.name)) {
      throw new ConfigurationError(`Parameter "${slot.name}" is declared more than once`);
    }
    names.add(slot.name);

    if (variadicSlot) {
      throw new ConfigurationError(
        `Parameter "${slot.name}" follows variadic parameter "${variadicSlot.name}"; a variadic parameter must be last`,
      );
    }

    switch (slot.kind) {
      case "required":
        if (optionalSlots.length > 0) {
          throw new ConfigurationError(
            `Required parameter "${slot.name}" at position ${index + 1} follows optional parameter "${optionalSlots[optionalSlots.length - 1].name}"`,
          );
        }
        requiredSlots.push(slot);
        break;
      case "optional":
        optionalSlots.push(slot);
        break;
      case "variadic":
        variadicSlot = slot;
        break;
    }
  }

  return {
    slots: [...slots],
    required: requiredSlots,
    optional: optionalSlots,
    ...(variadicSlot ? { variadic: variadicSlot } : {}),
  };
}

export const EMPTY_SIGNATURE: ParameterSignature = createSignature([]);

/** `<name>` for required, `[<name>]` for optional, `[<name>] ...` for variadic. */
export function signatureUsage(signature: ParameterSignature): string {
  return signature.slots
    .map((slot) => {
      switch (slot.kind) {
        case "required":
          return `<${slot.name}>`;
        case "optional":
          return `[<${slot.name}>]`;
        case "variadic":
          return `[<${slot.name}>] ...`;
      }
    })
    .join(" ");
}
