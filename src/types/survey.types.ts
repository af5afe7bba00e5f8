import type { PageElement } from './browser.types.js';

export type AnswerStrategy = 'yes-no' | 'numeric' | 'favorite' | 'opinion' | 'freeform';

export type ControlKind = 'radio' | 'checkbox' | 'text' | 'textarea' | 'select';

export interface QuestionOption {
  element: PageElement;
  label: string;
}

/**
 * One logical question on the current page. Rebuilt on every pass and
 * never persisted.
 */
export interface QuestionGroup {
  groupId: string;
  questionText: string;
  options: QuestionOption[];
}

export interface HandlerResult {
  control: ControlKind;
  /** Number of answers written to the page. */
  committed: number;
  /** True when the handler returned early because the run was paused or stopped. */
  interrupted: boolean;
}

export type RunStatus = 'idle' | 'running' | 'paused' | 'stopped';

export interface RunState {
  /** False once the worker has exited; a fresh start is needed. */
  alive: boolean;
  /** False while paused; the worker idles until it is set again. */
  running: boolean;
}

export interface RunSnapshot extends RunState {
  status: RunStatus;
  url: string | null;
  profile: string;
  delay: { min: number; max: number };
  passes: number;
  pagesAdvanced: number;
  answersCommitted: number;
}
