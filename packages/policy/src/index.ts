export { IdlePolicy, ScriptedPolicy, ReplayPolicy } from "./policies.js";
export { PatrolPolicy } from "./patrol-policy.js";
export { HashEmbedder } from "./hash-embedder.js";
export {
  FixedImportanceRater,
  KeywordImportanceRater,
  DEFAULT_KIND_BASE,
  DEFAULT_KEYWORDS,
} from "./importance-raters.js";
export type { KeywordRaterConfig } from "./importance-raters.js";
export { TemplateInsightGenerator } from "./template-insights.js";
export { TemplatePlanner } from "./template-planner.js";
export type { TemplatePlannerConfig } from "./template-planner.js";
