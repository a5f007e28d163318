#!/usr/bin/env node

/**
 * docgov CLI entry point
 *
 * Documentation governance for CI: contract and drift gates on change sets,
 * a ranked documentation gap backlog, and KPI/SLA tracking.
 */

import { Command } from 'commander';
import { initCommand } from './commands/init.js';
import { contractCheckCommand } from './commands/contract-check.js';
import { driftCheckCommand } from './commands/drift-check.js';
import { gapsCommand } from './commands/gaps.js';
import { kpiCommand } from './commands/kpi.js';
import { kpiSlaEvaluateCommand } from './commands/kpi-sla-evaluate.js';
import { configureLogger } from '../utils/logger.js';

const program = new Command();

// Hook to configure logger before any command runs
program.hook('preAction', (thisCommand) => {
  const opts = thisCommand.opts();
  configureLogger({
    quiet: opts.quiet ?? false,
    verbose: opts.verbose ?? false,
    noColor: opts.color === false,
    timestamps: process.env.CI === 'true' || opts.color === false,
  });
});

program
  .name('docgov')
  .description(
    'Documentation governance engine.\n\n' +
    'Gates change sets on docs updates, detects API/SDK reference drift,\n' +
    'ranks documentation gaps and tracks quality against SLA thresholds.'
  )
  .version('1.0.0')
  .option('-q, --quiet', 'Minimal output (errors only)', false)
  .option('-v, --verbose', 'Show debug information', false)
  .option('--no-color', 'Disable colored output (also enables timestamps)')
  .addHelpText(
    'after',
    `
Pull request gates:
  $ docgov contract-check --base origin/main --head HEAD
  $ docgov drift-check --base origin/main --head HEAD

Weekly reporting:
  $ docgov gaps analyze --since 7 --algolia-json exports/searches.json
  $ docgov kpi snapshot
  $ docgov kpi-sla-evaluate --current reports/kpi-wall.json --previous baseline/kpi-wall.json

Start with 'docgov init' to write docgov-policy.yml.
Exit codes: 0 pass, 1 gate failed, 2 error.
`
  );

program.addCommand(initCommand);
program.addCommand(contractCheckCommand);
program.addCommand(driftCheckCommand);
program.addCommand(gapsCommand);
program.addCommand(kpiCommand);
program.addCommand(kpiSlaEvaluateCommand);

await program.parseAsync();
