/**
 * Survey answering module public API: question classification, answer
 * synthesis, label resolution, the control handlers and page advancing.
 */

export { classify, detectTopicHints, type ClassifyOptions, type TopicHint } from './question-classifier.js';

export {
  AnswerSynthesizer,
  type AnswerSynthesizerOptions,
  type SynthesizedAnswer,
} from './answer-synthesizer.js';

export { deriveGroupId, type GroupIdentityInput } from './group-id.js';

export { LabelResolver } from './label-resolver.js';

export { PageAdvancer, type AdvanceStage, type PageAdvancerOptions } from './page-advancer.js';

export {
  createDefaultHandlers,
  DEFAULT_HANDLER_ORDER,
  BaseControlHandler,
  multiChoiceCount,
  RadioHandler,
  CheckboxHandler,
  SelectHandler,
  TextInputHandler,
  TextAreaHandler,
  type ControlGroup,
  type HandlerTally,
} from './handlers/index.js';

export type { HandlerContext, ControlHandler, ControlHandlerFactory } from './types.js';
