import { EventEmitter } from 'eventemitter3';

export interface RunStatusEvent {
  from: string;
  to: string;
  reason?: string;
}

export interface RunAnswerEvent {
  control: string;
  answer: string;
  groupId?: string;
}

export interface RunAdvancedEvent {
  stage: string;
  label: string;
}

export interface RunChallengeEvent {
  kind: string;
  marker: string;
}

export interface RunErrorEvent {
  error: string;
}

/**
 * All typed events emitted by the survey runner.
 * Keys are event names; values are the listener signatures.
 */
export interface AppEvents {
  'run:status': (event: RunStatusEvent) => void;
  'run:answer': (event: RunAnswerEvent) => void;
  'run:advanced': (event: RunAdvancedEvent) => void;
  'run:challenge': (event: RunChallengeEvent) => void;
  'run:error': (event: RunErrorEvent) => void;
}

/**
 * Strongly-typed event emitter. Components take one at construction and
 * default to the shared bus so cross-module communication stays in one
 * place and is fully typed.
 */
export class TypedEventEmitter extends EventEmitter<AppEvents> {}

export const eventBus = new TypedEventEmitter();
