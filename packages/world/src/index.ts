export {
  collectViolations,
  assertWorldTree,
  moveNode,
  childrenOfKind,
  nodeName,
  cloneWorld,
  deepFreeze,
} from "./world-tree.js";
export { LocationGraph, buildLocationGraph } from "./location-graph.js";
export type { LocationGraphOptions } from "./location-graph.js";
export { perceive, validTargetsFor, describePerception } from "./perception.js";
export { createBeliefState, mergePerception } from "./belief.js";
export { STATIONARY, startTransit, advanceTransit } from "./transit.js";
export type { StartTransitResult } from "./transit.js";
export { ObjectExecutor } from "./object-executor.js";
export type { TransitionOutcome } from "./object-executor.js";
export {
  buildWorld,
  parseWorldDefinition,
  loadWorldFile,
  DEFAULT_START_MINUTE,
  DEFAULT_WEATHER,
} from "./world-loader.js";
export type { AgentProfile, LoadedWorld, BuildWorldOptions } from "./world-loader.js";
