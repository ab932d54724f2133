#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { isValid, parse } from 'date-fns';
import { JsonFileLedgerStore } from '../core/dedup-ledger.js';
import { runReminderPipeline } from '../core/reminder-pipeline.js';
import { SmtpDispatcher } from '../services/mail-dispatcher.js';
import { createSource } from '../sources/index.js';
import { describeConfigGaps, loadConfig } from '../utils/config.js';
import { getErrorMessage } from '../utils/error-handler.js';
import { configureLogging, logger } from '../utils/logger.js';

interface SendRemindersOptions {
  date?: string;
  dryRun?: boolean;
  file?: string;
  ledger?: string;
}

const program = new Command();

program
  .name('send-reminders')
  .description('Email renewal reminders for agreements in the spreadsheet that are about to expire')
  .option('--date <yyyy-mm-dd>', 'Run as if today were this date')
  .option('--dry-run', 'Compose reminders without sending them or updating the ledger')
  .option('-f, --file <path>', 'Read a local spreadsheet instead of downloading the configured document')
  .option('--ledger <path>', 'Ledger file of sent reminders (overrides LEDGER_PATH)')
  .action(async (opts: SendRemindersOptions) => {
    try {
      const config = loadConfig();
      configureLogging(config.logging);

      for (const gap of describeConfigGaps(config)) {
        logger.warn(gap);
      }

      let now = new Date();
      if (opts.date) {
        const parsed = parse(opts.date, 'yyyy-MM-dd', new Date());
        if (!isValid(parsed)) {
          console.error(`Error: --date must be YYYY-MM-DD, got "${opts.date}"`);
          process.exit(1);
        }
        // keep the current time of day so the due-today window still applies
        parsed.setHours(now.getHours(), now.getMinutes());
        now = parsed;
      }

      const source = createSource(opts.file ? 'file' : 'drive', config);
      const summary = await runReminderPipeline(
        config,
        {
          source,
          dispatcher: SmtpDispatcher.fromConfig(config),
          ledgerStore: new JsonFileLedgerStore(opts.ledger ?? config.ledger.path),
        },
        {
          now,
          dryRun: opts.dryRun,
          identifier: opts.file,
        }
      );

      console.log('=== Reminder Summary ===');
      console.log(`Date:         ${summary.today}${summary.dryRun ? ' (dry run)' : ''}`);
      console.log(`Agreements:   ${summary.agreements}`);
      console.log(`Rows skipped: ${summary.skippedRows}`);
      console.log(`Due today:    ${summary.due}`);
      console.log(`Sent:         ${summary.sent}`);
      console.log(`Already sent: ${summary.alreadySent}`);
      console.log(`Failed:       ${summary.failures.length}`);

      if (summary.failures.length > 0) {
        console.log('\nFailed reminders:');
        for (const failure of summary.failures) {
          console.log(`  - ${failure.identifier}: ${failure.error}`);
        }
      }
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error('Reminder run aborted', { error: message });
      console.error(`Error: ${message}`);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${getErrorMessage(error)}`);
  process.exit(1);
});
