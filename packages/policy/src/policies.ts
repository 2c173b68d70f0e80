import type { Action, DecisionPolicy, DecisionRequest, RecordedDecisions } from "@tickvale/schemas";
import { IDLE } from "@tickvale/schemas";

/** Does nothing, every tick, for every agent. */
export class IdlePolicy implements DecisionPolicy {
  async decide(_request: DecisionRequest): Promise<unknown> {
    return IDLE;
  }
}

/**
 * Returns whatever the script holds for `(tick, agent)`, verbatim. Entries
 * are raw so tests can feed malformed output through the kernel.
 */
export class ScriptedPolicy implements DecisionPolicy {
  private script: Record<number, Record<string, unknown>>;

  constructor(script: Record<number, Record<string, unknown>>) {
    this.script = script;
  }

  async decide(request: DecisionRequest): Promise<unknown> {
    return this.script[request.tick]?.[request.agent_id] ?? IDLE;
  }
}

/** Feeds back the validated actions of a recorded run. */
export class ReplayPolicy implements DecisionPolicy {
  private decisions: RecordedDecisions;
  private misses = 0;

  constructor(decisions: RecordedDecisions) {
    this.decisions = decisions;
  }

  /** Requests the recording had no action for. */
  get missing(): number {
    return this.misses;
  }

  async decide(request: DecisionRequest): Promise<Action> {
    const action = this.decisions.get(request.tick)?.get(request.agent_id);
    if (!action) {
      this.misses += 1;
      return IDLE;
    }
    return action;
  }
}
