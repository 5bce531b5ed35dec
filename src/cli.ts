#!/usr/bin/env node
/**
 * esp-decoder CLI
 *
 * Decodes game plugin files (.esp/.esm/.esl) without their masters.
 */

import { Command } from 'commander';
import { batchCommand, decodeCommand } from './commands.js';
import type { BatchCommandOptions, DecodeCommandOptions } from './commands.js';

const program: Command = new Command();

const version = '0.1.0';

program
  .name('esp-decoder')
  .description('Decode plugin files standalone: records, subrecords, FormIDs and overrides')
  .version(version)
  .argument('[file]', 'Plugin file to decode')
  .option('--type <types...>', 'Record types to decode (e.g. WEAP AMMO KYWD)')
  .option('--csv <file>', 'Export the requested types to CSV')
  .option('--json <file>', 'Export analyses to JSON')
  .option('--dump <dir>', 'Write a full dump into a directory')
  .option('--summary', 'Print the file summary only')
  .option('-v, --verbose', 'Verbose logging')
  .action(async (file: string | undefined, options: DecodeCommandOptions) => {
    if (!file) {
      program.help();
    }
    try {
      const output: string | null = await decodeCommand(file, options);
      if (output !== null) {
        console.log(output);
      }
    } catch (error) {
      console.error('❌ Decode failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

program
  .command('batch')
  .description('Scan every plugin under a directory and write batch_scan_results.csv')
  .argument('<dir>', 'Directory to scan recursively')
  .option('--type <types...>', 'Record types to decode')
  .option('--dump <dir>', 'Output directory for the results')
  .action(async (dir: string, options: BatchCommandOptions) => {
    try {
      const rows = await batchCommand(dir, options);
      const failed: number = rows.filter((row) => row.error !== undefined).length;
      console.log('');
      console.log(`✅ Scanned ${rows.length} plugins (${failed} failed)`);
    } catch (error) {
      console.error('❌ Batch scan failed:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  });

await program.parseAsync();
