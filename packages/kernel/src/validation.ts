import type { Action, ValidTargets } from "@tickvale/schemas";
import { IDLE, isAction, validateActionData } from "@tickvale/schemas";

export interface ActionVerdict {
  action: Action;
  accepted: boolean;
  reason?: string;
}

function reject(reason: string): ActionVerdict {
  return { action: IDLE, accepted: false, reason };
}

/**
 * Checks an action's arguments against the agent's valid targets. Anything
 * outside them becomes IDLE. Validating an accepted action again returns it
 * unchanged.
 */
export function validateAction(action: Action, targets: ValidTargets): ActionVerdict {
  switch (action.kind) {
    case "IDLE":
      return { action, accepted: true };
    case "MOVE":
      return targets.locations.includes(action.to_location_id)
        ? { action, accepted: true }
        : reject(`location "${action.to_location_id}" is not a valid MOVE target`);
    case "INTERACT":
      return targets.objects.includes(action.object_id)
        ? { action, accepted: true }
        : reject(`object "${action.object_id}" is not within reach`);
    case "SAY":
      return targets.agents.includes(action.to_agent_id)
        ? { action, accepted: true }
        : reject(`agent "${action.to_agent_id}" is not within earshot`);
    default: {
      const _exhaustive: never = action;
      return reject(`unknown action ${JSON.stringify(_exhaustive)}`);
    }
  }
}

/** Schema-checks raw policy output, then validates it against the targets. */
export function coerceAction(raw: unknown, targets: ValidTargets): ActionVerdict {
  if (!isAction(raw)) {
    return reject(`malformed action: ${validateActionData(raw).errors.join(", ")}`);
  }
  return validateAction(raw, targets);
}
