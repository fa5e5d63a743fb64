#!/usr/bin/env node
import { Command } from 'commander';
import { errorMessage } from '../core/errors.js';
import { startDashboard, DEFAULT_PORT } from '../web/server.js';
import { loadSettings, setConfigKV } from './config_cmd.js';
import { parseLimit, printHistory } from './history.js';
import { runCommand, type RunOptions } from './run.js';

function fail(err: unknown) {
  console.error(`❌ ${errorMessage(err)}`);
  process.exitCode = 1;
}

const program = new Command();

program
  .name('dwgbatch')
  .description('Run AutoCAD scripts and LISP routines over many DWG files in parallel')
  .version('0.1.0');

// ✅ Run a batch
program
  .command('run')
  .argument('<drawings...>', 'DWG files to process')
  .requiredOption('-s, --script <paths...>', '.scr or .lsp files, applied in order')
  .option('--invoke <pairs...>', 'command to run after loading a LISP file, as <file.lsp>=<command>')
  .option('-p, --parallel <n>', 'parallel instances (1-12), defaults to the max_parallel setting')
  .option('-o, --output <dir>', 'directory for assembled scripts and logs')
  .option('--accore <path>', 'path to accoreconsole')
  .option('--no-log', 'do not capture console output into per-DWG log files')
  .action(async (drawings: string[], opts: RunOptions) => {
    try {
      process.exitCode = await runCommand(drawings, opts);
    } catch (err) {
      fail(err);
    }
  });

// ✅ Recorded results
program
  .command('history')
  .option('--limit <n>', 'number of jobs to show', '50')
  .action((opts: { limit: string }) => {
    try {
      printHistory(parseLimit(opts.limit));
    } catch (err) {
      fail(err);
    }
  });

// ✅ Read-only web dashboard
program
  .command('dashboard')
  .option('--port <n>', 'port to listen on', String(DEFAULT_PORT))
  .action((opts: { port: string }) => {
    startDashboard(Number(opts.port) || DEFAULT_PORT);
  });

// ✅ Config get/set
const config = program.command('config');
config.command('get').action(() => {
  try {
    console.log(loadSettings());
  } catch (err) {
    fail(err);
  }
});
config.command('set')
  .argument('<key>')
  .argument('<value>')
  .action((key: string, value: string) => {
    try {
      setConfigKV(key, value);
      console.log('OK');
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync(process.argv).catch(fail);
