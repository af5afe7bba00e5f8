import { TraversalLoop, type TraversalLoopOptions } from '../../src/runner/traversal-loop.js';
import { ProfileCatalog } from '../../src/profile/profile-catalog.js';
import { RunConfigStore } from '../../src/profile/run-config-store.js';
import { RunStateError, SessionStartError, ValidationError } from '../../src/shared/errors.js';
import {
  TypedEventEmitter,
  type RunChallengeEvent,
  type RunErrorEvent,
  type RunStatusEvent,
} from '../../src/shared/events.js';
import type { SessionConfig } from '../../src/types/index.js';
import { CheerioSession, StubDriver } from '../stubs/cheerio-session.js';
import { TEST_PROFILE, captureLogger, messages } from '../stubs/context.js';

const SESSION_CONFIG: SessionConfig = {
  profileDir: './data/test-profile',
  headless: true,
  viewport: { width: 800, height: 600 },
  actionTimeoutMs: 1000,
  navigationTimeoutMs: 1000,
};

const URL_1 = 'https://survey.test/1';
const URL_2 = 'https://survey.test/2';
const URL_DONE = 'https://survey.test/done';
const URL_CHALLENGE = 'https://survey.test/challenge';
const URL_LOOP = 'https://survey.test/loop';

const PAGES: Record<string, string> = {
  [URL_1]: `
    <div id="q1">
      <h2>Do you support the plan?</h2>
      <input type="radio" name="q1" id="q1-yes"><label for="q1-yes">Yes</label>
      <input type="radio" name="q1" id="q1-no"><label for="q1-no">No</label>
    </div>
    <button id="next">Next</button>`,
  [URL_2]: `
    <label for="age">How old are you?</label><input type="text" id="age">
    <input type="submit" id="submit" value="Submit">`,
  [URL_DONE]: '<p>Thank you for taking part.</p>',
  [URL_CHALLENGE]: `
    <iframe src="https://www.google.com/recaptcha/api2/anchor"></iframe>
    <div id="q"><input type="radio" name="q" id="q-a"><label for="q-a">A</label></div>
    <button id="next">Next</button>`,
  [URL_LOOP]: '<button id="again">Continue</button>',
};

function newSession(): CheerioSession {
  return new CheerioSession('<html><body></body></html>', PAGES)
    .onClickNavigate('#next', URL_2)
    .onClickNavigate('#submit', URL_DONE)
    .onClickNavigate('#again', URL_LOOP);
}

function setup(overrides: Partial<TraversalLoopOptions> = {}) {
  const driver = new StubDriver(newSession);
  const events = new TypedEventEmitter();
  const { logger, channel } = captureLogger();
  const config = new RunConfigStore({
    catalog: new ProfileCatalog([TEST_PROFILE]),
    initialProfile: TEST_PROFILE.name,
    initialDelay: { min: 0, max: 0 },
    logger,
  });

  const statuses: RunStatusEvent[] = [];
  events.on('run:status', (event) => statuses.push(event));

  const loop = new TraversalLoop({
    driver,
    sessionConfig: SESSION_CONFIG,
    config,
    events,
    logger,
    random: () => 0,
    idlePollMs: 5,
    afterAdvanceMs: 1,
    joinTimeoutMs: 500,
    ...overrides,
  });
  return { loop, driver, events, channel, statuses };
}

function session(driver: StubDriver): CheerioSession {
  const last = driver.last;
  if (!last) {
    throw new Error('no session opened');
  }
  return last;
}

const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('TraversalLoop', () => {
  let active: TraversalLoop | undefined;

  afterEach(async () => {
    await active?.stop();
    active = undefined;
  });

  it('answers every page, advances, and pauses at the end', async () => {
    const { loop, driver, channel, statuses } = setup();
    active = loop;

    const started = await loop.start({ url: URL_1 });
    expect(started.status).toBe('running');

    await vi.waitFor(() => expect(loop.snapshot().status).toBe('paused'));

    expect(loop.snapshot()).toEqual({
      status: 'paused',
      alive: true,
      running: false,
      url: URL_1,
      profile: 'Tester',
      delay: { min: 0, max: 0 },
      passes: 3,
      pagesAdvanced: 2,
      answersCommitted: 2,
    });
    expect(session(driver).currentUrl()).toBe(URL_DONE);
    expect(statuses.map((s) => [s.to, s.reason])).toEqual([
      ['running', 'started'],
      ['paused', 'dead-end'],
    ]);
    expect(messages(channel)).toContain('No next/submit control, pausing');
  });

  it('pauses on a challenge without touching the page', async () => {
    const { loop, driver, events } = setup();
    active = loop;
    const challenges: RunChallengeEvent[] = [];
    events.on('run:challenge', (event) => challenges.push(event));

    await loop.start({ url: URL_CHALLENGE });
    await vi.waitFor(() => expect(loop.snapshot().status).toBe('paused'));

    expect(challenges).toEqual([{ kind: 'frame', marker: 'recaptcha' }]);
    expect(session(driver).callsTo('click')).toHaveLength(0);
    expect(loop.snapshot()).toMatchObject({ passes: 1, answersCommitted: 0 });
  });

  it('resumes on the current page without reloading', async () => {
    const { loop, driver, statuses } = setup();
    active = loop;

    await loop.start({ url: URL_CHALLENGE });
    await vi.waitFor(() => expect(loop.snapshot().status).toBe('paused'));

    session(driver).load(PAGES[URL_DONE] ?? '');
    const resumed = await loop.start();
    expect(resumed.status).toBe('running');

    await vi.waitFor(() => expect(statuses).toHaveLength(4));
    expect(statuses.map((s) => s.reason)).toEqual(['started', 'challenge', 'resumed', 'dead-end']);
    expect(session(driver).callsTo('navigate')).toHaveLength(1);
    expect(driver.sessions).toHaveLength(1);
  });

  it('requires a url to start', async () => {
    const { loop, driver } = setup();

    await expect(loop.start()).rejects.toThrow(ValidationError);
    await expect(loop.start()).rejects.toThrow('A survey URL is required to start');
    expect(loop.snapshot().status).toBe('idle');
    expect(driver.sessions).toHaveLength(0);
  });

  it('stays idle when the browser cannot start', async () => {
    const { loop, driver } = setup();
    driver.failNextOpen = true;

    await expect(loop.start({ url: URL_1 })).rejects.toThrow(SessionStartError);
    expect(loop.snapshot().status).toBe('idle');
  });

  it('starts on the current page when navigation fails', async () => {
    const { loop, channel } = setup();
    active = loop;

    await loop.start({ url: 'https://survey.test/missing' });
    await vi.waitFor(() => expect(loop.snapshot().status).toBe('paused'));

    expect(messages(channel)).toContain(
      'Navigation failed, starting on the current page (url=https://survey.test/missing, ' +
        'error=No page registered for https://survey.test/missing)',
    );
  });

  it('pauses and resumes a running loop', async () => {
    const { loop } = setup();
    active = loop;

    await loop.start({ url: URL_LOOP });
    await vi.waitFor(() => expect(loop.snapshot().pagesAdvanced).toBeGreaterThanOrEqual(2));

    expect(loop.pause().status).toBe('paused');
    await wait(20);
    const frozen = loop.snapshot().passes;
    await wait(30);
    expect(loop.snapshot().passes).toBe(frozen);

    await loop.start();
    await vi.waitFor(() => expect(loop.snapshot().passes).toBeGreaterThan(frozen));
  });

  it('rejects pause before the run started', () => {
    const { loop } = setup();
    expect(() => loop.pause()).toThrow(RunStateError);
  });

  it('stops the worker and closes the browser', async () => {
    const { loop, driver, statuses } = setup();

    await loop.start({ url: URL_LOOP });
    await vi.waitFor(() => expect(loop.snapshot().pagesAdvanced).toBeGreaterThanOrEqual(1));

    const stopped = await loop.stop();
    expect(stopped).toMatchObject({ status: 'stopped', alive: false, running: false });
    expect(session(driver).closed).toBe(true);

    const passes = loop.snapshot().passes;
    await wait(30);
    expect(loop.snapshot().passes).toBe(passes);
    expect(statuses.at(-1)).toEqual({ from: 'running', to: 'stopped', reason: 'operator' });
  });

  it('opens a fresh session when started again after a stop', async () => {
    const { loop, driver } = setup();
    active = loop;

    await loop.start({ url: URL_DONE });
    await vi.waitFor(() => expect(loop.snapshot().status).toBe('paused'));
    await loop.stop();

    const restarted = await loop.start();
    expect(restarted).toMatchObject({ status: 'running', pagesAdvanced: 0, answersCommitted: 0 });
    expect(driver.sessions).toHaveLength(2);
    expect(session(driver).callsTo('navigate').map((c) => c.detail)).toEqual([URL_DONE]);
  });

  it('gives up waiting for a stuck worker and still closes the browser', async () => {
    const { loop, driver, channel } = setup({
      joinTimeoutMs: 30,
      handlers: () => [{ control: 'radio', run: () => new Promise<never>(() => {}) }],
    });

    await loop.start({ url: URL_1 });
    await wait(10);
    await loop.stop();

    expect(messages(channel)).toContain('Worker did not stop in time (timeoutMs=30)');
    expect(session(driver).closed).toBe(true);
  });

  it('pauses and reports when a pass fails unexpectedly', async () => {
    const { loop, events, statuses } = setup({
      handlers: () => [
        {
          control: 'radio',
          run: async () => {
            throw new Error('boom');
          },
        },
      ],
    });
    active = loop;
    const errors: RunErrorEvent[] = [];
    events.on('run:error', (event) => errors.push(event));

    await loop.start({ url: URL_1 });
    await vi.waitFor(() => expect(loop.snapshot().status).toBe('paused'));

    expect(errors).toEqual([{ error: 'boom' }]);
    expect(statuses.at(-1)?.reason).toBe('error');
  });

  describe('openUrl', () => {
    it('opens a page without starting, and start reuses it', async () => {
      const { loop, driver } = setup();
      active = loop;

      const opened = await loop.openUrl(URL_DONE);
      expect(opened).toMatchObject({ status: 'idle', url: URL_DONE });
      expect(session(driver).currentUrl()).toBe(URL_DONE);

      await loop.start();
      await vi.waitFor(() => expect(loop.snapshot().status).toBe('paused'));
      expect(session(driver).callsTo('navigate')).toHaveLength(1);
    });

    it('is refused while running', async () => {
      const { loop } = setup();
      active = loop;

      await loop.start({ url: URL_LOOP });
      await expect(loop.openUrl(URL_1)).rejects.toThrow(RunStateError);
    });

    it('surfaces navigation errors', async () => {
      const { loop } = setup();
      active = loop;

      await expect(loop.openUrl('https://survey.test/missing')).rejects.toThrow(
        'No page registered for https://survey.test/missing',
      );
    });
  });

  describe('configure', () => {
    it('swaps the delay window', () => {
      const { loop } = setup();

      const snapshot = loop.configure({ delayMin: 0.5, delayMax: 1 });
      expect(snapshot.delay).toEqual({ min: 0.5, max: 1 });
    });

    it('keeps the previous configuration when the update is invalid', () => {
      const { loop } = setup();

      expect(() => loop.configure({ profile: 'Nope' })).toThrow('Unknown response profile "Nope"');
      expect(() => loop.configure({ delayMin: 3, delayMax: 1 })).toThrow(ValidationError);
      expect(loop.snapshot()).toMatchObject({ profile: 'Tester', delay: { min: 0, max: 0 } });
    });
  });
});
