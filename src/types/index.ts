export type {
  QueryKind,
  SyntheticEventType,
  PageElement,
  SessionConfig,
  BrowserSession,
  BrowserDriver,
} from './browser.types.js';

export type {
  ResponseProfile,
  DelayWindow,
  RunConfig,
} from './profile.types.js';

export type {
  AnswerStrategy,
  ControlKind,
  QuestionOption,
  QuestionGroup,
  HandlerResult,
  RunStatus,
  RunState,
  RunSnapshot,
} from './survey.types.js';
