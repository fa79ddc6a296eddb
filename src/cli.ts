#!/usr/bin/env node
import { Command } from 'commander';
import type { Logger } from 'pino';
import { isMissingBrowserError, launchBrowser } from './browser';
import { loadConfig, parseList, redactConfig, validateConfig } from './config';
import { toIsoDate } from './dates';
import { createMonitorState } from './differ';
import { ConfigError } from './errors';
import { getFacility, listFacilities } from './facilities';
import { createLogger } from './logger';
import { AvailabilityMonitor, type CycleResult } from './monitor';
import { createNotificationDispatcher, sampleBatch } from './notifiers';
import { writeScanOutput } from './output';
import { PollScheduler } from './scheduler';
import { BrowserSessionHolder } from './session';
import type { AppConfig, FacilityProfile } from './types';

const TOOL_NAME = 'courtwatch';
const VERSION = '0.1.0';

interface GlobalOptions {
  config: string;
  verbose?: boolean;
}

interface RunOptions {
  headless?: boolean;
  timeout?: string;
}

interface ScanOptions extends RunOptions {
  notify: boolean;
}

interface MonitorOptions extends RunOptions {
  interval?: string;
  maxAttempts?: string;
}

interface WatchOptions extends RunOptions {
  times: string;
  courts?: string;
  intervalSeconds: string;
  maxAttempts: string;
}

interface Setup {
  profile: FacilityProfile;
  config: AppConfig;
  logger: Logger;
}

function parseCliNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function applyRunOverrides(config: AppConfig, options: RunOptions): AppConfig {
  const next = { ...config };

  if (options.headless !== undefined) {
    next.headless = options.headless;
  }

  if (options.timeout !== undefined) {
    next.pageLoadTimeout = parseCliNumber(options.timeout, config.pageLoadTimeout);
  }

  return next;
}

function printFacilities(write: (line: string) => void): void {
  for (const facility of listFacilities()) {
    write(`- ${facility.id}: ${facility.displayName} (${facility.bookingUrl})`);
  }
}

function setup(facilityName: string, options: RunOptions = {}): Setup | null {
  const { config: configPath, verbose } = program.opts<GlobalOptions>();

  const profile = getFacility(facilityName);
  if (!profile) {
    console.error(`Unknown facility: ${facilityName}`);
    console.error('Available facilities:');
    printFacilities((line) => console.error(line));
    process.exitCode = 1;
    return null;
  }

  const config = applyRunOverrides(loadConfig(profile, { path: configPath }), options);
  const logger = createLogger(config, { level: verbose ? 'debug' : undefined });
  return { profile, config, logger };
}

function ensureValid(config: AppConfig, profile: FacilityProfile): void {
  const errors = validateConfig(config, profile);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}

function reportFailure(error: unknown, logger: Logger, message: string): void {
  if (error instanceof ConfigError) {
    console.error('Config errors:');
    for (const fieldError of error.errors) {
      console.error(`- ${fieldError.field}: ${fieldError.message}`);
    }
  } else if (isMissingBrowserError(error)) {
    logger.error('Chromium is missing. Run: npx playwright-core install chromium');
  } else {
    logger.error({ err: error }, message);
  }
  process.exitCode = 1;
}

function createSessions(config: AppConfig, logger: Logger): BrowserSessionHolder {
  logger.debug({ headless: config.headless, timeoutMs: config.pageLoadTimeout }, 'Browser settings');
  return new BrowserSessionHolder(() => launchBrowser(config), logger);
}

async function runMonitoring(
  { profile, config, logger }: Setup,
  intervalMs: number,
  maxAttempts: number
): Promise<void> {
  ensureValid(config, profile);

  logger.info(
    {
      facility: profile.displayName,
      bookingUrl: config.bookingUrl,
      intervalMs,
      maxAttempts: maxAttempts || 'unlimited',
      email: config.notification.email || undefined,
      sms: config.notification.phoneNumber || undefined,
      preferences: config.preferences,
    },
    'Starting court monitoring'
  );

  const state = createMonitorState();
  const dispatcher = createNotificationDispatcher(config, profile, state, logger);

  const sessions = createSessions(config, logger);
  const monitor = new AvailabilityMonitor({ config, profile, logger, sessions, state }, { dispatcher });
  const scheduler = new PollScheduler(() => monitor.runCycle(), {
    intervalMs,
    maxAttempts,
    backoffMs: config.errorBackoffSeconds * 1000,
    isFatal: isMissingBrowserError,
    logger,
  });

  const onSignal = (signal: NodeJS.Signals): void => scheduler.stop(signal);
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  try {
    await scheduler.run();
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await sessions.release();
  }
}

const program = new Command();

program
  .name(TOOL_NAME)
  .description('Watch facility booking calendars and alert when courts open up')
  .version(VERSION)
  .option('--config <path>', 'Path to config file', '.env')
  .option('--verbose', 'Enable debug logging');

program
  .command('list')
  .description('List supported facilities')
  .action(() => {
    console.log('Available facilities:');
    printFacilities((line) => console.log(line));
  });

program
  .command('config')
  .description('Show resolved configuration for a facility (redacted)')
  .argument('<facility>', 'Facility id')
  .option('--validate', 'Validate required config values')
  .action((facilityName: string, options: { validate?: boolean }) => {
    const ctx = setup(facilityName);
    if (!ctx) {
      return;
    }
    const { profile, config, logger } = ctx;
    const errors = validateConfig(config, profile);

    logger.debug({ errorCount: errors.length }, 'Config validation complete');

    if (options.validate) {
      if (errors.length > 0) {
        console.error('Config errors:');
        for (const error of errors) {
          console.error(`- ${error.field}: ${error.message}`);
        }
        process.exitCode = 1;
      } else {
        console.log('Config is valid.');
      }
    }

    console.log(JSON.stringify(redactConfig(config), null, 2));
  });

program
  .command('scan')
  .description('Run a single availability check and write the results')
  .argument('<facility>', 'Facility id')
  .option('--headless', 'Run in headless mode (default: true)')
  .option('--no-headless', 'Run with visible browser')
  .option('--timeout <ms>', 'Page load timeout in ms')
  .option('--no-notify', 'Skip notifications')
  .action(async (facilityName: string, options: ScanOptions) => {
    const ctx = setup(facilityName, options);
    if (!ctx) {
      return;
    }
    const { profile, config, logger } = ctx;

    try {
      if (options.notify) {
        ensureValid(config, profile);
      }

      const state = createMonitorState();
      const dispatcher = options.notify
        ? createNotificationDispatcher(config, profile, state, logger)
        : null;

      const start = Date.now();
      const errors: string[] = [];

      const sessions = createSessions(config, logger);
      const monitor = new AvailabilityMonitor({ config, profile, logger, sessions, state }, { dispatcher });
      let outcome: CycleResult | null = null;
      try {
        outcome = await monitor.runCycle();
      } catch (error) {
        if (isMissingBrowserError(error)) {
          throw error;
        }
        logger.error({ err: error }, 'Scan failed');
        errors.push(error instanceof Error ? error.message : String(error));
      } finally {
        await sessions.release();
      }

      const now = new Date();
      const outputPath = writeScanOutput(
        config,
        {
          meta: {
            tool: TOOL_NAME,
            version: VERSION,
            facility: profile.id,
            bookingUrl: config.bookingUrl,
            timestamp: now.toISOString(),
            durationMs: Date.now() - start,
            totalSlots: outcome?.totalSlots ?? 0,
            newSlots: outcome?.newCount ?? 0,
          },
          data: {
            slots: outcome?.slots ?? {},
            newSlots: outcome?.newSlots ?? {},
          },
          errors,
        },
        now
      );
      logger.info({ outputPath }, 'Output written');

      if (errors.length > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      reportFailure(error, logger, 'Scan failed');
    }
  });

program
  .command('monitor')
  .description('Continuously monitor a facility for new courts')
  .argument('<facility>', 'Facility id')
  .option('--headless', 'Run in headless mode (default: true)')
  .option('--no-headless', 'Run with visible browser')
  .option('--timeout <ms>', 'Page load timeout in ms')
  .option('--interval <minutes>', 'Minutes between checks')
  .option('--max-attempts <n>', 'Stop after N checks (0 = unlimited)')
  .action(async (facilityName: string, options: MonitorOptions) => {
    const ctx = setup(facilityName, options);
    if (!ctx) {
      return;
    }
    const { config, logger } = ctx;
    config.monitoringIntervalMinutes = parseCliNumber(options.interval, config.monitoringIntervalMinutes);
    config.maxAttempts = parseCliNumber(options.maxAttempts, config.maxAttempts);

    try {
      await runMonitoring(ctx, config.monitoringIntervalMinutes * 60 * 1000, config.maxAttempts);
    } catch (error) {
      reportFailure(error, logger, 'Monitoring failed');
    }
  });

program
  .command('watch')
  .description('Poll frequently for specific timeslots')
  .argument('<facility>', 'Facility id')
  .requiredOption('--times <list>', 'Comma-separated times to watch (e.g., "6:00 pm,7:00 pm")')
  .option('--courts <list>', 'Comma-separated court numbers to watch')
  .option('--interval-seconds <s>', 'Seconds between checks', '30')
  .option('--max-attempts <n>', 'Stop after N checks (0 = unlimited)', '120')
  .option('--headless', 'Run in headless mode (default: true)')
  .option('--no-headless', 'Run with visible browser')
  .option('--timeout <ms>', 'Page load timeout in ms')
  .action(async (facilityName: string, options: WatchOptions) => {
    const ctx = setup(facilityName, options);
    if (!ctx) {
      return;
    }
    const { config, logger } = ctx;
    const intervalSeconds = parseCliNumber(options.intervalSeconds, 30);

    config.preferences = {
      preferredTimes: parseList(options.times),
      preferredCourts: parseList(options.courts),
    };
    config.monitoringIntervalMinutes = intervalSeconds / 60;
    config.maxAttempts = parseCliNumber(options.maxAttempts, 120);

    try {
      await runMonitoring(ctx, intervalSeconds * 1000, config.maxAttempts);
    } catch (error) {
      reportFailure(error, logger, 'Watch failed');
    }
  });

program
  .command('test-notify')
  .description('Send a sample notification through every configured channel')
  .argument('<facility>', 'Facility id')
  .action(async (facilityName: string) => {
    const ctx = setup(facilityName);
    if (!ctx) {
      return;
    }
    const { profile, config, logger } = ctx;

    try {
      ensureValid(config, profile);
      const dispatcher = createNotificationDispatcher(config, profile, createMonitorState(), logger);
      const delivered = await dispatcher.notify(sampleBatch(toIsoDate(new Date())));
      if (delivered) {
        console.log('Test notification dispatched.');
      } else {
        console.error('Test notification failed.');
        process.exitCode = 1;
      }
    } catch (error) {
      reportFailure(error, logger, 'Test notification failed');
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
