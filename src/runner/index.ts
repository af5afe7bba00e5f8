/**
 * Runner module public API: the traversal loop and its run state, the
 * pacing controller and the log channel the control surface reads.
 */

export { TraversalLoop, type TraversalLoopOptions } from './traversal-loop.js';
export { RunStateMachine } from './run-state.js';
export { PacingController, type PacingControllerOptions } from './pacing-controller.js';
export { LogChannel, formatRecord, type LogLine, type LogListener } from './log-channel.js';
