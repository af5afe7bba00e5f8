import { ProfileCatalog } from '../../src/profile/profile-catalog.js';
import { DEFAULT_PROFILE } from '../../src/profile/presets.js';
import { RunConfigStore } from '../../src/profile/run-config-store.js';
import { EmptyAnswerPoolError, ValidationError } from '../../src/shared/errors.js';
import { TEST_PROFILE, captureLogger, messages } from '../stubs/context.js';

function createStore() {
  const { logger, channel } = captureLogger();
  const store = new RunConfigStore({
    catalog: new ProfileCatalog([DEFAULT_PROFILE, TEST_PROFILE]),
    initialDelay: { min: 1, max: 3 },
    logger,
  });
  return { store, channel };
}

describe('RunConfigStore', () => {
  it('starts on the Default profile without a url', () => {
    const { store } = createStore();

    expect(store.current()).toEqual({ delay: { min: 1, max: 3 }, profile: DEFAULT_PROFILE });
    expect(Object.isFrozen(store.current())).toBe(true);
  });

  it('merges a partial delay update with the current window', () => {
    const { store } = createStore();

    expect(store.update({ delayMax: 5 }).delay).toEqual({ min: 1, max: 5 });
    expect(store.update({ delayMin: 4 }).delay).toEqual({ min: 4, max: 5 });
  });

  it('replaces the snapshot instead of mutating it', () => {
    const { store } = createStore();
    const before = store.current();

    store.update({ url: 'https://survey.test/start', profile: 'Tester' });

    expect(before).toEqual({ delay: { min: 1, max: 3 }, profile: DEFAULT_PROFILE });
    expect(store.current()).toMatchObject({ url: 'https://survey.test/start', profile: TEST_PROFILE });
  });

  it('keeps the previous snapshot when an update is rejected', () => {
    const { store } = createStore();
    const before = store.current();

    expect(() => store.update({ url: 'https://survey.test/next', delayMin: 9 })).toThrow(ValidationError);
    expect(store.current()).toBe(before);
  });

  it('accepts an inline profile definition', () => {
    const { store } = createStore();

    const config = store.update({
      profile: { name: 'Inline', description: '', shortAnswers: ['Sure'], longAnswers: ['Sounds good.'] },
    });
    expect(config.profile.name).toBe('Inline');
  });

  it('rejects an inline profile with an empty pool', () => {
    const { store } = createStore();

    expect(() =>
      store.update({ profile: { name: 'Empty', description: '', shortAnswers: [], longAnswers: ['x'] } }),
    ).toThrow(EmptyAnswerPoolError);
  });

  it('logs profile and delay changes', () => {
    const { store, channel } = createStore();

    store.update({ profile: 'Tester', delayMin: 0 });

    expect(messages(channel)).toEqual([
      'Profile set to Tester (profile=Tester)',
      'Delay window updated (min=0, max=3)',
    ]);
  });
});
