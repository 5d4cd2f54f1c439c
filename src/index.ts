#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './config.js';
import { createLogger } from './log.js';
import { parseArgs, UsageError } from './cli/args.js';
import { graphFile, resumeStateFile, runPlanFile } from './runner.js';
import { ReadlineTerminal } from './tools/terminal/readline.js';

async function main(): Promise<number> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const logger = createLogger({ quiet: config.quiet, logSteps: config.logSteps });

  if (args.command === 'graph') {
    process.stdout.write(graphFile(args.file));
    return 0;
  }

  // ^C ends the run cleanly: the current step stays pending and a checkpoint is written.
  const controller = new AbortController();
  const onSigint = () => {
    if (controller.signal.aborted) process.exit(130);
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  const terminal = new ReadlineTerminal();
  try {
    const opts = {
      terminal,
      stateDir: args.stateDir ?? config.stateDir,
      logger,
      dryRun: args.dryRun ?? config.dryRun,
      signal: controller.signal,
      maxExpansions: config.maxExpansions,
    };
    const outcome = args.command === 'run'
      ? await runPlanFile(args.file, opts)
      : await resumeStateFile(args.file, opts);
    return outcome.ok ? 0 : 1;
  } finally {
    terminal.close();
    process.off('SIGINT', onSigint);
  }
}

main().then(code => { process.exitCode = code; }).catch(err => {
  if (err instanceof UsageError) {
    console.error(err.message);
    process.exitCode = 2;
    return;
  }
  console.error('[fatal]', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
