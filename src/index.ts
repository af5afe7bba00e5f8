/**
 * Application entry point for the survey pilot.
 *
 * 1. Environment validation
 * 2. Run log channel and response profiles
 * 3. Traversal loop on a Playwright driver
 * 4. Control server startup
 *
 * SIGINT/SIGTERM stop the run (closing the browser) before the server.
 */

import { getLogger, addLogSink, setLogLevel } from './shared/logger.js';
import { eventBus } from './shared/events.js';
import { PlaywrightDriver } from './browser/index.js';
import { ProfileCatalog, RunConfigStore } from './profile/index.js';
import { LogChannel, TraversalLoop } from './runner/index.js';
import { createServer } from './server.js';

const logger = getLogger('server');

const FORCE_KILL_TIMEOUT_MS = 30_000;

let appShutdown: ((reason: string) => Promise<void>) | undefined;

async function main(): Promise<void> {
  logger.info('Starting survey pilot...');

  // ---------------------------------------------------------------------------
  // 1. Validate environment
  // ---------------------------------------------------------------------------
  let env: Awaited<typeof import('./env.js')>['env'];
  try {
    const envModule = await import('./env.js');
    env = envModule.env;
    setLogLevel(env.LOG_LEVEL);
    logger.info({ nodeEnv: env.NODE_ENV }, 'Environment validated');
  } catch (error) {
    logger.fatal({ err: error }, 'Environment validation failed');
    process.exit(1);
  }

  // ---------------------------------------------------------------------------
  // 2. Log channel and profiles
  // ---------------------------------------------------------------------------
  const logChannel = new LogChannel(env.LOG_BUFFER_SIZE);
  addLogSink(logChannel);

  let catalog: ProfileCatalog;
  let configStore: RunConfigStore;
  try {
    catalog = ProfileCatalog.fromFile(env.PROFILES_PATH);
    configStore = new RunConfigStore({
      catalog,
      initialProfile: env.DEFAULT_PROFILE,
      initialDelay: { min: env.DELAY_MIN_SECONDS, max: env.DELAY_MAX_SECONDS },
    });
  } catch (error) {
    logger.fatal({ err: error }, 'Response profiles could not be loaded');
    process.exit(1);
  }

  // ---------------------------------------------------------------------------
  // 3. Traversal loop
  // ---------------------------------------------------------------------------
  const runner = new TraversalLoop({
    driver: new PlaywrightDriver(),
    sessionConfig: {
      profileDir: env.BROWSER_PROFILE_DIR,
      headless: env.BROWSER_HEADLESS,
      executablePath: env.BROWSER_EXECUTABLE_PATH,
      channel: env.BROWSER_CHANNEL,
      viewport: { width: env.VIEWPORT_WIDTH, height: env.VIEWPORT_HEIGHT },
      actionTimeoutMs: env.ACTION_TIMEOUT_MS,
      navigationTimeoutMs: env.NAVIGATION_TIMEOUT_MS,
    },
    config: configStore,
    events: eventBus,
    yesBias: env.YES_BIAS,
    joinTimeoutMs: env.STOP_JOIN_TIMEOUT_MS,
  });

  // ---------------------------------------------------------------------------
  // 4. Control server
  // ---------------------------------------------------------------------------
  try {
    const app = await createServer({ runner, logChannel, catalog, events: eventBus });

    let isShuttingDown = false;
    appShutdown = async (reason: string) => {
      if (isShuttingDown) {
        logger.warn({ reason }, 'Shutdown already in progress, ignoring duplicate signal');
        return;
      }
      isShuttingDown = true;
      logger.info({ reason }, 'Initiating graceful shutdown');

      const forceKillTimer = setTimeout(() => {
        logger.fatal('Graceful shutdown timed out after 30s, forcing exit');
        process.exit(1);
      }, FORCE_KILL_TIMEOUT_MS);
      forceKillTimer.unref();

      try {
        await runner.stop();
      } catch (error) {
        logger.error({ err: error }, 'Error stopping the run');
      }

      try {
        await app.close();
        logger.info('Server closed');
      } catch (error) {
        logger.error({ err: error }, 'Error during server close');
      }

      clearTimeout(forceKillTimer);
      logger.info('Graceful shutdown complete');
      process.exit(0);
    };

    process.on('SIGINT', () => void appShutdown?.('SIGINT'));
    process.on('SIGTERM', () => void appShutdown?.('SIGTERM'));

    await app.listen({ host: env.HOST, port: env.PORT });

    logger.info(
      {
        port: env.PORT,
        environment: env.NODE_ENV,
        headless: env.BROWSER_HEADLESS,
        profiles: catalog.list().map((p) => p.name),
      },
      `Survey pilot control surface on http://${env.HOST}:${env.PORT}/api/v1`,
    );
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

// ---------------------------------------------------------------------------
// Global error handlers
// ---------------------------------------------------------------------------

process.on('uncaughtException', (error: Error) => {
  logger.fatal({ err: error }, 'Uncaught exception - initiating graceful shutdown');
  if (appShutdown) {
    void appShutdown('uncaughtException');
  } else {
    process.exit(1);
  }
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.fatal({ err: reason }, 'Unhandled rejection - initiating graceful shutdown');
  if (appShutdown) {
    void appShutdown('unhandledRejection');
  } else {
    process.exit(1);
  }
});

void main();
