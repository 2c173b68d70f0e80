import type {
  CanonicalWorldState,
  InteractVerb,
  ObjectState,
  ObjectStateChangedEvent,
  TransitionRule,
  TransitionTable,
} from "@tickvale/schemas";

export interface TransitionOutcome {
  next_state: ObjectState;
  success: boolean;
  narration_key: string;
}

function matches(state: ObjectState, when: ObjectState | undefined): boolean {
  if (!when) return true;
  for (const [key, value] of Object.entries(when)) {
    if (state[key] !== value) return false;
  }
  return true;
}

/**
 * Applies INTERACT verbs to objects through per-type transition tables.
 *
 * Each call reads the object's state as it is at that moment, so within a
 * tick a later agent sees what an earlier agent left behind. Whether the
 * outcome is physically plausible is up to the table, not the executor.
 */
export class ObjectExecutor {
  private tables: Map<string, TransitionTable>;

  constructor(tables: Record<string, TransitionTable> = {}) {
    this.tables = new Map(Object.entries(tables));
  }

  hasTable(objectType: string): boolean {
    return this.tables.has(objectType);
  }

  /** Looks up `(state, verb)` without touching any world state. */
  resolve(objectType: string, state: ObjectState, verb: InteractVerb): TransitionOutcome {
    const rule: TransitionRule | undefined = (this.tables.get(objectType) ?? []).find(
      (r) => r.verb === verb && matches(state, r.when),
    );
    if (!rule) {
      return {
        next_state: { ...state },
        success: false,
        narration_key: `${objectType}.${verb.toLowerCase()}.unavailable`,
      };
    }
    const success = rule.success ?? true;
    return {
      next_state: success ? { ...state, ...rule.set } : { ...state },
      success,
      narration_key: rule.narration_key,
    };
  }

  /**
   * Runs `verb` against the object in `world`, mutating it on success.
   * A failed transition leaves the world untouched but still yields an event.
   */
  execute(
    world: CanonicalWorldState,
    agentId: string,
    objectId: string,
    verb: InteractVerb,
  ): ObjectStateChangedEvent {
    const object = world.objects[objectId];
    if (!object) throw new Error(`Unknown object "${objectId}"`);
    const fromState = { ...object.state };
    const outcome = this.resolve(object.object_type, object.state, verb);
    if (outcome.success) object.state = outcome.next_state;
    return {
      kind: "OBJECT_STATE_CHANGED",
      object_id: objectId,
      agent_id: agentId,
      verb,
      from_state: fromState,
      to_state: { ...object.state },
      success: outcome.success,
      narration_key: outcome.narration_key,
    };
  }
}
