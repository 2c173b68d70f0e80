import type { NameLookup, PlanContext, PlanItem, Planner } from "@tickvale/schemas";

export interface TemplatePlannerConfig {
  names?: NameLookup;
  /** Stops to cycle through, per agent. Agents without one stay where they are. */
  routes?: Record<string, readonly string[]>;
  /** Default: 4 */
  ticksPerItem?: number;
  /** Default: 5 */
  itemsPerPlan?: number;
}

/**
 * Lays out a day as back-to-back items over the agent's route: a start, some
 * time at each stop, and a wrap-up. The goal, if any, goes in the first item.
 */
export class TemplatePlanner implements Planner {
  private names: NameLookup;
  private routes: Record<string, readonly string[]>;
  private ticksPerItem: number;
  private itemsPerPlan: number;

  constructor(config: TemplatePlannerConfig = {}) {
    this.names = config.names ?? ((id) => id);
    this.routes = config.routes ?? {};
    this.ticksPerItem = config.ticksPerItem ?? 4;
    this.itemsPerPlan = config.itemsPerPlan ?? 5;
  }

  async plan(agentId: string, context: PlanContext): Promise<PlanItem[]> {
    const name = this.names(agentId);
    const route = this.routes[agentId] ?? [];
    const stops = route.length > 0 ? route : [context.location_id];

    const items: PlanItem[] = [];
    for (let i = 0; i < this.itemsPerPlan; i++) {
      const stop = stops[i % stops.length] ?? context.location_id;
      const place = this.names(stop);
      let description: string;
      if (i === 0) {
        description = context.goal
          ? `${name} starts the day at ${place}, meaning to ${context.goal}.`
          : `${name} starts the day at ${place}.`;
      } else if (i === this.itemsPerPlan - 1) {
        description = `${name} wraps up at ${place}.`;
      } else {
        description = `${name} spends some time at ${place}.`;
      }
      const start = context.tick + i * this.ticksPerItem;
      items.push({ start_tick: start, end_tick: start + this.ticksPerItem, location_id: stop, description });
    }
    return items;
  }
}
