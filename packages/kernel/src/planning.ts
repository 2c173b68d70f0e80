import type { PlanItem } from "@tickvale/schemas";

/** Drops items with a blank description or an empty or inverted tick range. */
export function usablePlanItems(items: readonly PlanItem[]): PlanItem[] {
  return items.filter(
    (item) =>
      Number.isInteger(item.start_tick) &&
      Number.isInteger(item.end_tick) &&
      item.end_tick > item.start_tick &&
      item.description.trim().length > 0,
  );
}

/**
 * Cuts each item into slices of at most `sliceTicks` ticks. An item that
 * needs more than one slice gets a `(part k of n)` suffix on each.
 */
export function decomposePlan(items: readonly PlanItem[], sliceTicks: number): PlanItem[] {
  const slices: PlanItem[] = [];
  for (const item of items) {
    const count = Math.ceil((item.end_tick - item.start_tick) / sliceTicks);
    for (let k = 0; k < count; k++) {
      const start = item.start_tick + k * sliceTicks;
      slices.push({
        start_tick: start,
        end_tick: Math.min(start + sliceTicks, item.end_tick),
        location_id: item.location_id,
        description: count === 1 ? item.description : `${item.description} (part ${k + 1} of ${count})`,
      });
    }
  }
  return slices;
}

/** First slice whose range covers `tick`. */
export function activePlanItem(slices: readonly PlanItem[], tick: number): PlanItem | undefined {
  return slices.find((slice) => slice.start_tick <= tick && tick < slice.end_tick);
}

/** True once nothing in the plan reaches `tick` or later. */
export function planExhausted(slices: readonly PlanItem[], tick: number): boolean {
  return !slices.some((slice) => slice.end_tick > tick);
}
