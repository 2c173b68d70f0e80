export { TickScheduler } from "./scheduler.js";
export type {
  TickSchedulerOptions,
  SchedulerStatus,
  StepResult,
  DecisionListener,
  MemoryListener,
} from "./scheduler.js";
export { DEFAULT_SCHEDULER_CONFIG, resolveSchedulerConfig, schedulerConfigFromRecord } from "./config.js";
export type { SchedulerConfig } from "./config.js";
export { validateAction, coerceAction } from "./validation.js";
export type { ActionVerdict } from "./validation.js";
export { applyWorldDynamics, formatClock, MINUTES_PER_DAY } from "./world-dynamics.js";
export type { DynamicsConfig, WeatherConfig } from "./world-dynamics.js";
export { TemplateNarrator, fillTemplate } from "./narration.js";
export { TickPublisher } from "./publisher.js";
export { activePlanItem, decomposePlan, planExhausted, usablePlanItems } from "./planning.js";
