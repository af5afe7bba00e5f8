import type { FastifyInstance } from 'fastify';
import { createServer } from '../../src/server.js';
import { formatSseMessage } from '../../src/api/routes/logs.routes.js';
import { formatUptime } from '../../src/api/routes/health.routes.js';
import { ProfileCatalog } from '../../src/profile/profile-catalog.js';
import { RunConfigStore } from '../../src/profile/run-config-store.js';
import { TraversalLoop } from '../../src/runner/traversal-loop.js';
import { TypedEventEmitter } from '../../src/shared/events.js';
import { CheerioSession, StubDriver } from '../stubs/cheerio-session.js';
import { TEST_PROFILE, captureLogger } from '../stubs/context.js';

const SURVEY_URL = 'https://survey.test/start';

describe('API routes', () => {
  let app: FastifyInstance;
  let runner: TraversalLoop;
  let driver: StubDriver;
  let logger: ReturnType<typeof captureLogger>['logger'];

  beforeEach(async () => {
    const captured = captureLogger();
    logger = captured.logger;
    const catalog = new ProfileCatalog([TEST_PROFILE]);
    const events = new TypedEventEmitter();
    driver = new StubDriver(
      () => new CheerioSession('<html></html>', { [SURVEY_URL]: '<button id="more">Next</button>' }),
    );
    runner = new TraversalLoop({
      driver,
      sessionConfig: {
        profileDir: './data/test-profile',
        headless: true,
        viewport: { width: 800, height: 600 },
        actionTimeoutMs: 1000,
        navigationTimeoutMs: 1000,
      },
      config: new RunConfigStore({ catalog, initialProfile: 'Tester', initialDelay: { min: 0, max: 0 }, logger }),
      events,
      logger,
      random: () => 0,
      idlePollMs: 5,
      afterAdvanceMs: 5,
    });
    app = await createServer({ runner, logChannel: captured.channel, catalog, events });
  });

  afterEach(async () => {
    await runner.stop();
    await app.close();
  });

  describe('GET /api/v1/health', () => {
    it('reports ok with the run status', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/health' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ status: 'ok', run: 'idle' });
    });
  });

  describe('run control', () => {
    it('returns the idle snapshot', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/run' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        data: {
          status: 'idle',
          alive: false,
          running: false,
          url: null,
          profile: 'Tester',
          delay: { min: 0, max: 0 },
          passes: 0,
          pagesAdvanced: 0,
          answersCommitted: 0,
        },
      });
    });

    it('starts and stops a run', async () => {
      const started = await app.inject({ method: 'POST', url: '/api/v1/run/start', payload: { url: SURVEY_URL } });
      expect(started.statusCode).toBe(202);
      expect(started.json()).toMatchObject({ data: { status: 'running', url: SURVEY_URL } });

      const opened = await app.inject({ method: 'POST', url: '/api/v1/run/open', payload: { url: SURVEY_URL } });
      expect(opened.statusCode).toBe(409);
      expect(opened.json()).toEqual({
        error: {
          code: 'INVALID_RUN_STATE',
          message: 'Pause the run before opening another page',
          details: { status: 'running' },
        },
      });

      const stopped = await app.inject({ method: 'POST', url: '/api/v1/run/stop' });
      expect(stopped.statusCode).toBe(200);
      expect(stopped.json()).toMatchObject({ data: { status: 'stopped', alive: false } });
      expect(driver.last?.closed).toBe(true);
    });

    it('rejects a malformed start body with 400', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/v1/run/start', payload: { delayMin: -1 } });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request body validation failed',
          details: [{ field: 'delayMin', message: 'Number must be greater than or equal to 0' }],
        },
      });
    });

    it('rejects a start without any url with 422', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/v1/run/start', payload: {} });

      expect(res.statusCode).toBe(422);
      expect(res.json()).toEqual({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'A survey URL is required to start',
          details: { field: 'url' },
        },
      });
    });

    it('rejects an unknown profile in a configuration update', async () => {
      const res = await app.inject({ method: 'PUT', url: '/api/v1/run/config', payload: { profile: 'Nope' } });

      expect(res.statusCode).toBe(422);
      expect(res.json()).toMatchObject({ error: { message: 'Unknown response profile "Nope"' } });
    });

    it('applies a configuration update', async () => {
      const res = await app.inject({
        method: 'PUT',
        url: '/api/v1/run/config',
        payload: { delayMin: 0.5, delayMax: 2 },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toMatchObject({ data: { delay: { min: 0.5, max: 2 } } });
    });

    it('answers 409 when pausing a run that never started', async () => {
      const res = await app.inject({ method: 'POST', url: '/api/v1/run/pause' });

      expect(res.statusCode).toBe(409);
      expect(res.json()).toEqual({
        error: {
          code: 'INVALID_RUN_STATE',
          message: 'Cannot pause a run that is idle',
          details: { status: 'idle' },
        },
      });
    });
  });

  describe('profiles', () => {
    it('lists profile summaries', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/profiles' });

      expect(res.json()).toEqual({
        data: [{ name: 'Tester', description: 'Fixed answers for tests', shortAnswers: 2, longAnswers: 2 }],
      });
    });

    it('returns one profile with its pools', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/profiles/Tester' });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ data: TEST_PROFILE });
    });

    it('answers 422 for an unknown profile', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/profiles/Nope' });

      expect(res.statusCode).toBe(422);
    });
  });

  describe('logs', () => {
    it('returns the most recent lines', async () => {
      logger.info('first');
      logger.info('second');
      logger.info('third');

      const res = await app.inject({ method: 'GET', url: '/api/v1/logs?limit=2' });
      const body: { data: Array<{ seq: number; level: string; text: string }> } = res.json();

      expect(res.statusCode).toBe(200);
      expect(body.data.map((line) => [line.seq, line.level, line.text.slice(11)])).toEqual([
        [2, 'info', 'second'],
        [3, 'info', 'third'],
      ]);
    });

    it('serves pending lines once', async () => {
      logger.info('queued');
      logger.warn('also queued');

      const first = await app.inject({ method: 'GET', url: '/api/v1/logs/pending' });
      const second = await app.inject({ method: 'GET', url: '/api/v1/logs/pending' });
      const body: { data: Array<{ seq: number; level: string; text: string }> } = first.json();

      expect(body.data.map((line) => [line.seq, line.level, line.text.slice(11)])).toEqual([
        [1, 'info', 'queued'],
        [2, 'warn', 'also queued'],
      ]);
      expect(second.json()).toEqual({ data: [] });
    });

    it('rejects an out-of-range limit', async () => {
      const res = await app.inject({ method: 'GET', url: '/api/v1/logs?limit=0' });

      expect(res.statusCode).toBe(400);
      expect(res.json()).toMatchObject({ error: { message: 'Query parameter validation failed' } });
    });
  });

  it('answers 404 with the error envelope', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/v1/nothing' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Resource not found' } });
  });
});

describe('formatSseMessage', () => {
  it('frames an event with its JSON data', () => {
    expect(formatSseMessage('log', { seq: 1 })).toBe('event: log\ndata: {"seq":1}\n\n');
  });
});

describe('formatUptime', () => {
  it('uses the largest units that apply', () => {
    expect(formatUptime(42_000)).toBe('42s');
    expect(formatUptime(3_723_000)).toBe('1h 2m 3s');
    expect(formatUptime(90_061_000)).toBe('1d 1h 1m');
  });
});
