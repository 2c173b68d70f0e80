import type { Action, InteractVerb, NameLookup, NarrationRenderer, SimEvent } from "@tickvale/schemas";
import { formatClock } from "./world-dynamics.js";

const PAST_TENSE: Record<InteractVerb, string> = {
  USE: "used",
  OPEN: "opened",
  CLOSE: "closed",
  TAKE: "took from",
  DROP: "dropped into",
};

/** Replaces `{name}` placeholders; unknown placeholders are left as they are. */
export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

/**
 * Renders actions and events as one English sentence. Object interactions
 * look their `narration_key` up in the supplied templates first; templates
 * may use `{actor}`, `{object}` and `{verb}`.
 */
export class TemplateNarrator implements NarrationRenderer {
  private templates: Record<string, string>;

  constructor(templates: Record<string, string> = {}) {
    this.templates = { ...templates };
  }

  narrate(subject: Action | SimEvent, names: NameLookup, actorId?: string): string {
    const actor = actorId !== undefined ? names(actorId) : "Someone";
    switch (subject.kind) {
      case "IDLE":
        return `${actor} waits.`;
      case "INTERACT":
        return `${actor} tries to ${subject.verb.toLowerCase()} ${names(subject.object_id)}.`;
      case "MOVE":
        if ("to_location_id" in subject) return `${actor} heads for ${names(subject.to_location_id)}.`;
        return `${names(subject.agent_id)} arrived at ${names(subject.to)} from ${names(subject.from)}.`;
      case "SAY":
        if ("to_agent_id" in subject) return `${actor} says to ${names(subject.to_agent_id)}: "${subject.utterance}"`;
        return `${names(subject.from_agent)} said to ${names(subject.to_agent)}: "${subject.utterance}"`;
      case "OBJECT_STATE_CHANGED": {
        const values = {
          actor: names(subject.agent_id),
          object: names(subject.object_id),
          verb: subject.verb.toLowerCase(),
        };
        const template = this.templates[subject.narration_key];
        if (template !== undefined) return fillTemplate(template, values);
        return subject.success
          ? `${values.actor} ${PAST_TENSE[subject.verb]} ${values.object}.`
          : `${values.actor} could not ${values.verb} ${values.object}.`;
      }
      case "WEATHER_CHANGED":
        return `The weather turned from ${subject.old} to ${subject.new}.`;
      case "TIME_ADVANCED":
        return `It is now ${formatClock(subject.minute_of_day)}.`;
      default: {
        const _exhaustive: never = subject;
        return JSON.stringify(_exhaustive);
      }
    }
  }
}
