export type { CaptionPools } from "./captions.js"
export { loadCaptionPools } from "./captions.js"
export { fixed, num, roundTo } from "./format.js"
export { choice, range, sampleParam, sampleParameters } from "./params.js"
export type { EngagementFields, GenerateRequest, ScenarioPoolOptions } from "./pool.js"
export {
  CTA_TEXT,
  ScenarioPool,
  buildEngagement,
  matchCandidates,
  pickDistractors,
  selectTemplate,
} from "./pool.js"
export { createTemplateRegistry } from "./registry.js"
export type {
  ChoiceParam,
  DiagramType,
  Engagement,
  EngagementKind,
  ParamSpec,
  ParamValues,
  QuizOptions,
  RangeParam,
  ScenarioTemplate,
} from "./types.js"
export { defineTemplate } from "./types.js"
