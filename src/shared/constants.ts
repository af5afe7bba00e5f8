// ---------------------------------------------------------------------------
// Question keyword sets (lower-case, matched as substrings)
// ---------------------------------------------------------------------------

export const QUESTION_KEYWORDS = {
  YES_NO: ['support', 'agree', 'do you', 'should', 'is it', 'yes/no', 'would you'],
  NUMERIC: ['age', 'years', 'how many', 'number of', 'how old'],
  FAVORITE: ['favorite', 'prefer', 'which do you prefer'],
  OPINION: ['thoughts', 'comments', 'suggestions', 'opinion', 'ideas', 'why', 'explain'],
  LOCATION: ['city', 'state', 'country', 'where do you live', 'residence'],
} as const;

// ---------------------------------------------------------------------------
// Answer synthesis
// ---------------------------------------------------------------------------

export const ANSWER_DEFAULTS = {
  /** Probability of answering "Yes" to a yes/no question. */
  YES_BIAS: 0.7,
  /** Probability of drawing an opinion answer from the long pool. */
  LONG_OPINION_PROBABILITY: 0.5,
  NUMERIC_MIN: 18,
  NUMERIC_MAX: 65,
  /** Bounds on how many boxes/options a multi-choice question gets. */
  MULTI_CHOICE_MIN: 2,
  MULTI_CHOICE_MAX: 5,
} as const;

export const PLACEHOLDERS = {
  OPTION: '<opt>',
  QUESTION: 'question',
  TEXT: 'text',
  TEXTAREA: 'textarea',
  SELECT: 'select',
  CHECKBOX: '<box>',
} as const;

// ---------------------------------------------------------------------------
// Page selectors
// ---------------------------------------------------------------------------

export const SELECTORS = {
  RADIO: "input[type='radio'], [role='radio']",
  CHECKBOX: "input[type='checkbox'], [role='checkbox']",
  SELECT: 'select',
  OPTION: 'option',
  TEXT_INPUT: "input[type='text'], input:not([type]), [role='textbox']",
  TEXTAREA: 'textarea',
  GROUP_SCOPE: "fieldset, [role='radiogroup'], [role='group']",
  GROUP_CONTAINER: 'div',
  LABEL: 'label',
  FIELDSET: 'fieldset',
  LEGEND: 'legend',
  QUESTION_HEADING: '[data-question], h1, h2, h3, h4, h5, h6, p.question, .question-text',
  CLICKABLE: "button, [role='button']",
  SUBMIT_INPUT: "input[type='submit']",
  FORM: 'form',
  FORM_BUTTON: 'button',
} as const;

/** Attributes that carry a stable group identity, in precedence order. */
export const GROUP_ID_ATTRIBUTES = ['data-interceptor-id', 'id'] as const;

// ---------------------------------------------------------------------------
// Page progression
// ---------------------------------------------------------------------------

/** Words that mark a control as advancing the survey, in precedence order. */
export const PROGRESSION_WORDS: readonly string[] = [
  'next',
  'submit',
  'continue',
  'enter',
  'go',
  'ok',
  'agree',
  'confirm',
  'send',
  'complete',
  'finish',
  'proceed',
  'advance',
];

// ---------------------------------------------------------------------------
// Challenge detection
// ---------------------------------------------------------------------------

/** Substrings of embedded frame URLs that belong to verification providers. */
export const CHALLENGE_FRAME_MARKERS: readonly string[] = [
  'recaptcha',
  'hcaptcha',
  'geetest',
  'challenges.cloudflare.com',
  'arkoselabs',
  'funcaptcha',
];

export const CHALLENGE_TEXT_MARKER = 'captcha';

// ---------------------------------------------------------------------------
// Timing
// ---------------------------------------------------------------------------

export const TIMING = {
  /** Width of one pacing sleep slice; bounds cancellation latency. */
  PACE_SLICE_MS: 100,
  /** Extra random delay added on top of every delay window draw. */
  PACE_JITTER_SECONDS: 0.4,
  /** How often a paused worker rechecks its flags. */
  IDLE_POLL_MS: 120,
  /** Wait after scrolling an element into view before dispatching events. */
  SCROLL_SETTLE_MS: 50,
  /** Time given to a new page to render after a progression click. */
  AFTER_ADVANCE_MS: 1_500,
  /** Bounded wait for the worker when stopping. */
  STOP_JOIN_TIMEOUT_MS: 400,
  NAVIGATION_TIMEOUT_MS: 30_000,
  ACTION_TIMEOUT_MS: 5_000,
} as const;

export const DEFAULT_DELAY_WINDOW = {
  min: 1.0,
  max: 2.5,
} as const;

// ---------------------------------------------------------------------------
// File-system paths
// ---------------------------------------------------------------------------

export const PATHS = {
  BROWSER_PROFILE: './data/browser-profile',
  PROFILES: './config/profiles.json',
} as const;
