import type { SlotValues } from "@promptsmith/contracts";

export function parseSlotArgs(args: string[]): SlotValues {
  const slots: SlotValues = {};
  for (const arg of args) {
    const separator = arg.indexOf("=");
    if (separator <= 0) {
      throw new Error(`Expected slot=value, got '${arg}'.`);
    }
    slots[arg.slice(0, separator)] = arg.slice(separator + 1);
  }
  return slots;
}
