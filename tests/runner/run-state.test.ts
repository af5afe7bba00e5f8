import { RunStateMachine } from '../../src/runner/run-state.js';
import { RunStateError } from '../../src/shared/errors.js';
import { TypedEventEmitter, type RunStatusEvent } from '../../src/shared/events.js';
import { captureLogger } from '../stubs/context.js';

function machine() {
  const events = new TypedEventEmitter();
  const seen: RunStatusEvent[] = [];
  events.on('run:status', (event) => seen.push(event));
  return { state: new RunStateMachine(events, captureLogger().logger), seen };
}

describe('RunStateMachine', () => {
  it('starts idle and not alive', () => {
    const { state } = machine();
    expect(state.status).toBe('idle');
    expect(state.flags()).toEqual({ alive: false, running: false });
  });

  it('keeps the flags in step with the status', () => {
    const { state, seen } = machine();

    state.transition('running', 'started');
    expect(state.flags()).toEqual({ alive: true, running: true });

    state.transition('paused', 'operator');
    expect(state.flags()).toEqual({ alive: true, running: false });

    state.transition('stopped');
    expect(state.flags()).toEqual({ alive: false, running: false });

    expect(seen).toEqual([
      { from: 'idle', to: 'running', reason: 'started' },
      { from: 'running', to: 'paused', reason: 'operator' },
      { from: 'paused', to: 'stopped', reason: undefined },
    ]);
  });

  it('treats a move to the current status as a no-op', () => {
    const { state, seen } = machine();
    state.transition('running');

    expect(state.transition('running')).toBe(false);
    expect(seen).toHaveLength(1);
  });

  it('rejects moves the lifecycle does not allow', () => {
    const { state } = machine();

    expect(state.canTransition('paused')).toBe(false);
    expect(() => state.transition('paused')).toThrow(RunStateError);
    expect(() => state.transition('paused')).toThrow('Cannot go from idle to paused');

    state.transition('stopped');
    expect(state.canTransition('paused')).toBe(false);
    expect(state.canTransition('running')).toBe(true);
  });
});
