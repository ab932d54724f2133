#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { format } from 'date-fns';
import { cellToString, loadAgreements } from '../core/agreement-extractor.js';
import { classifyReminder, daysUntil, reminderTag } from '../core/reminder-classifier.js';
import { decodeTable } from '../parsers/index.js';
import { createSource } from '../sources/index.js';
import { loadConfig } from '../utils/config.js';
import { getErrorMessage } from '../utils/error-handler.js';
import { configureLogging, logger } from '../utils/logger.js';

interface InspectOptions {
  file?: string;
  rows: number;
}

const program = new Command();

program
  .name('inspect-sheet')
  .description('Show how the spreadsheet is read: header row, column roles and reminder buckets')
  .option('-f, --file <path>', 'Inspect a local spreadsheet instead of the configured document')
  .option('--rows <n>', 'Number of raw rows to preview', (value) => parseInt(value, 10), 8)
  .action(async (opts: InspectOptions) => {
    try {
      const config = loadConfig();
      configureLogging(config.logging);

      const source = createSource(opts.file ? 'file' : 'drive', config);
      const { buffer, filename } = await source.fetch(opts.file ?? config.source.documentId);
      const rows = await decodeTable(buffer, filename, { sheetName: config.source.sheetName });

      console.log(`=== Preview (first ${opts.rows} rows) ===`);
      for (const row of rows.slice(0, opts.rows)) {
        console.log(row.map((cell) => cellToString(cell)).join(' | '));
      }

      const extraction = loadAgreements(rows, {
        maxHeaderScan: config.table.maxHeaderScan,
        headerTokens: config.table.headerTokens,
        columnKeywords: config.table.columnKeywords,
        dayFirst: config.table.dayFirst,
        defaultRecipient: config.mail.defaultRecipients[0],
      });

      console.log(`\nHeader row: ${extraction.headerIndex}`);
      console.log('Column roles:');
      for (const [role, column] of Object.entries(extraction.roleMap)) {
        console.log(`  ${role.padEnd(9)} -> ${column}`);
      }

      const now = new Date();
      console.log('\n=== Agreements ===');
      for (const agreement of extraction.agreements) {
        const bucket = classifyReminder(agreement.expiryDate, now, config.reminders);
        const tag = reminderTag(bucket, now, config.reminders) ?? '-';
        console.log(
          `  row ${agreement.rowNumber}: ${agreement.displayName} <${agreement.email}> ` +
            `expires ${format(agreement.expiryDate, 'yyyy-MM-dd')} ` +
            `(${daysUntil(agreement.expiryDate, now)}d) reminder: ${tag}`
        );
      }

      if (extraction.failures.length > 0) {
        console.log('\n=== Skipped rows ===');
        for (const failure of extraction.failures) {
          console.log(`  row ${failure.rowNumber}: ${failure.reason}`);
        }
      }
    } catch (error) {
      const message = getErrorMessage(error);
      logger.error('Inspection failed', { error: message });
      console.error(`Error: ${message}`);
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(`Error: ${getErrorMessage(error)}`);
  process.exit(1);
});
