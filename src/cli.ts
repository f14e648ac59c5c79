#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig, resetConfig, type Config } from './config/index.js';
import { App, setupGracefulShutdown } from './app.js';
import { createLogger } from './utils/logger.js';
import { errorMessage } from './errors/index.js';
import { formatScheduleTime, type DeliveryMethod, type Schedule } from './schedules/index.js';
import {
  parseDeliveryMethod,
  parseInstant,
  parseList,
  parseNonNegativeInt,
  parseTimeOfDay,
  parseWeekdays,
  type TimeOfDay,
} from './cli-options.js';

const VERSION = '0.1.0';

function loadCliConfig(verbose?: boolean): Config {
  resetConfig();
  const config = loadConfig();
  if (verbose) {
    config.logging.level = 'debug';
  }
  return config;
}

/**
 * Open the app for a one-shot command and close it afterwards. Errors are
 * printed and turn into exit code 1.
 */
async function withApp(action: (app: App) => Promise<void> | void, verbose?: boolean): Promise<void> {
  let app: App | null = null;
  try {
    const config = loadCliConfig(verbose);
    // One-shot commands only log warnings unless asked
    if (!verbose && config.logging.level === 'info') {
      config.logging.level = 'warn';
    }
    app = new App({ config, logger: createLogger(config.logging) });
    await action(app);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  } finally {
    if (app) {
      await app.stop();
    }
  }
}

function describeSchedule(schedule: Schedule): string {
  const flags = [
    schedule.isEnabled ? 'enabled' : 'disabled',
    schedule.deliveryMethod,
    schedule.isDefault ? 'default' : null,
    schedule.favoritesOnly ? 'favorites' : null,
  ].filter((flag): flag is string => flag !== null);

  const lines = [`  ${schedule.id}  ${formatScheduleTime(schedule)}  [${flags.join(', ')}]`];
  if (schedule.categories.length > 0) {
    lines.push(`    categories: ${schedule.categories.join(', ')}`);
  }
  if (schedule.activeDays) {
    lines.push(`    days: ${schedule.activeDays.join(', ')}`);
  }
  if (schedule.lastDeliveryDate !== null) {
    lines.push(
      `    last delivery: ${new Date(schedule.lastDeliveryDate).toISOString()} (${schedule.lastDeliveredQuoteId ?? '-'})`
    );
  }
  return lines.join('\n');
}

const program = new Command();

program
  .name('quotecast')
  .description('Deliver quotes on a schedule and track delivery streaks')
  .version(VERSION);

// Deliver command - one batch now
program
  .command('deliver')
  .description('Deliver quotes for every schedule that is due')
  .option('--at <iso>', 'Evaluate at this instant instead of now', parseInstant)
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: { at?: number; verbose?: boolean }) => {
    await withApp(async (app) => {
      const result = await app.getService().deliverDueQuotes(options.at);
      if (!result.ok) {
        throw result.error;
      }

      const { outcomes } = result.value;
      if (outcomes.length === 0) {
        console.log('No schedules due.');
        return;
      }
      for (const outcome of outcomes) {
        switch (outcome.status) {
          case 'delivered':
            console.log(
              `${outcome.scheduleId}: delivered ${outcome.quoteId}` +
                (outcome.surfaceError ? ` (surface error: ${outcome.surfaceError})` : '')
            );
            break;
          case 'failed':
            console.log(`${outcome.scheduleId}: failed (${outcome.error})`);
            break;
          default:
            console.log(`${outcome.scheduleId}: ${outcome.status.replace(/_/g, ' ')}`);
        }
      }
    }, options.verbose);
  });

// Run command - periodic trigger until interrupted
program
  .command('run')
  .description('Run the delivery trigger until interrupted')
  .option('-v, --verbose', 'Enable verbose logging')
  .action((options: { verbose?: boolean }) => {
    try {
      const config = loadCliConfig(options.verbose);
      const logger = createLogger(config.logging);
      const app = new App({ config, logger });
      setupGracefulShutdown(app, logger);
      app.start();
      logger.info('quotecast is running. Press Ctrl+C to stop.');
    } catch (error) {
      console.error('Failed to start quotecast:', errorMessage(error));
      process.exit(1);
    }
  });

// Schedule commands
const schedules = program.command('schedules').description('Manage delivery schedules');

schedules
  .command('list')
  .description('List schedules')
  .option('--json', 'Output as JSON')
  .action(async (options: { json?: boolean }) => {
    await withApp((app) => {
      const service = app.getService();
      const ensured = service.ensureDefaultSchedule();
      if (!ensured.ok) throw ensured.error;

      const all = service.getAllSchedules();
      if (!all.ok) throw all.error;

      if (options.json) {
        console.log(JSON.stringify(all.value, null, 2));
        return;
      }
      console.log(`Schedules (${all.value.length}):`);
      for (const schedule of all.value) {
        console.log(describeSchedule(schedule));
        const next = service.getNextDeliveryTime(schedule.id);
        if (next.ok && next.value !== null) {
          console.log(`    next: ${new Date(next.value).toISOString()}`);
        }
      }
    });
  });

schedules
  .command('add')
  .description('Add a schedule')
  .requiredOption('-t, --time <HH:mm>', 'Local time of day', parseTimeOfDay)
  .option('-m, --method <method>', 'notification, widget or both', parseDeliveryMethod)
  .option('-f, --favorites', 'Only deliver favorite quotes')
  .option('-c, --categories <list>', 'Comma-separated categories', parseList)
  .option('-x, --exclude-days <n>', 'Do not repeat quotes delivered within n days', parseNonNegativeInt)
  .option('-d, --days <list>', 'Active weekdays, e.g. mon,wed,fri', parseWeekdays)
  .option('--default', 'Make this the default schedule')
  .option('--disabled', 'Create the schedule disabled')
  .action(
    async (options: {
      time: TimeOfDay;
      method?: DeliveryMethod;
      favorites?: boolean;
      categories?: string[];
      excludeDays?: number;
      days?: number[];
      default?: boolean;
      disabled?: boolean;
    }) => {
      await withApp((app) => {
        const created = app.getService().createSchedule({
          scheduledHour: options.time.hour,
          scheduledMinute: options.time.minute,
          deliveryMethod: options.method,
          favoritesOnly: options.favorites ?? false,
          categories: options.categories,
          excludeRecentDays: options.excludeDays,
          activeDays: options.days ?? null,
          isDefault: options.default ?? false,
          isEnabled: !options.disabled,
        });
        if (!created.ok) throw created.error;

        console.log('Created schedule:');
        console.log(describeSchedule(created.value));
      });
    }
  );

for (const [name, isEnabled] of [
  ['enable', true],
  ['disable', false],
] as const) {
  schedules
    .command(`${name} <id>`)
    .description(`${isEnabled ? 'Enable' : 'Disable'} a schedule`)
    .action(async (id: string) => {
      await withApp((app) => {
        const updated = app.getService().setEnabled(id, isEnabled);
        if (!updated.ok) throw updated.error;
        console.log(`Schedule ${id} ${isEnabled ? 'enabled' : 'disabled'}.`);
      });
    });
}

schedules
  .command('remove <id>')
  .description('Delete a schedule and its delivery history')
  .action(async (id: string) => {
    await withApp((app) => {
      const deleted = app.getService().deleteSchedule(id);
      if (!deleted.ok) throw deleted.error;
      console.log(`Schedule ${id} removed.`);
    });
  });

// Quote commands
const quotes = program.command('quotes').description('Manage the quote catalog');

quotes
  .command('add <text>')
  .description('Add a quote to the catalog')
  .requiredOption('-a, --author <name>', 'Author of the quote')
  .option('-c, --categories <list>', 'Comma-separated categories', parseList)
  .option('-f, --favorite', 'Mark as favorite')
  .action(async (text: string, options: { author: string; categories?: string[]; favorite?: boolean }) => {
    await withApp((app) => {
      const quote = app.getStore().addQuote({
        text,
        author: options.author,
        categories: options.categories ?? [],
        isFavorite: options.favorite ?? false,
      });
      console.log(`Added quote ${quote.id}.`);
    });
  });

quotes
  .command('list')
  .description('List the quote catalog')
  .action(async () => {
    await withApp((app) => {
      const all = app.getStore().getAllQuotes();
      console.log(`Quotes (${all.length}):`);
      for (const quote of all) {
        const star = quote.isFavorite ? '*' : ' ';
        console.log(`${star} ${quote.id}  "${quote.text}" (${quote.author})`);
      }
    });
  });

// Streak command
program
  .command('streak')
  .description('Show delivery streaks')
  .action(async () => {
    await withApp((app) => {
      const service = app.getService();
      const streaks = service.getDeliveryStreaks();
      if (!streaks.ok) throw streaks.error;
      const stats = service.getStats();
      if (!stats.ok) throw stats.error;

      console.log(`Current streak: ${streaks.value.current} day(s)`);
      console.log(`Longest streak: ${streaks.value.longest} day(s)`);
      console.log(`Days with a delivery: ${streaks.value.activeDays}`);
      console.log(
        `Schedules: ${stats.value.scheduleCount} (${stats.value.enabledCount} enabled)` +
          (stats.value.lastDeliveryDate !== null
            ? `, last delivery ${new Date(stats.value.lastDeliveryDate).toISOString()}`
            : '')
      );
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`Error: ${errorMessage(error)}`);
  process.exit(1);
});
