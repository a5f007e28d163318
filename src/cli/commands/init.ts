/**
 * docgov init command
 *
 * Writes the default policy pack so the other commands have patterns and
 * thresholds to work with. Refuses to overwrite an existing pack unless
 * confirmed or forced.
 */

import { Command } from 'commander';
import { confirm } from '@inquirer/prompts';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import type { InitOptions } from '../../types/index.js';
import { DEFAULT_POLICY_PACK_PATH, DEFAULT_POLICY_PACK_YAML } from '../../core/policy/policy-pack.js';
import { fileExists, writeReportFile } from '../../core/report/report-files.js';

export type InitOutcome = 'written' | 'declined';

export interface InitPrompt {
  interactive: boolean;
  confirm: (message: string) => Promise<boolean>;
}

const terminalPrompt: InitPrompt = {
  interactive: process.stdin.isTTY === true,
  confirm: (message) => confirm({ message, default: false }),
};

export async function runInit(options: InitOptions, prompt: InitPrompt = terminalPrompt): Promise<InitOutcome> {
  if ((await fileExists(options.output)) && !options.force) {
    logger.warning(`${options.output} already exists`);

    if (!prompt.interactive) {
      logger.error('Policy pack exists. Use --force to overwrite in non-interactive mode.');
      return 'declined';
    }
    const overwrite = await prompt.confirm(`Overwrite ${options.output}?`);
    if (!overwrite) {
      logger.info('Aborted', 'Use --force to overwrite without prompting');
      return 'declined';
    }
  }

  await writeReportFile(options.output, DEFAULT_POLICY_PACK_YAML);
  logger.success(`Created ${options.output}`);
  logger.blank();
  logger.info('Next step', "Edit the patterns, then run 'docgov contract-check --base origin/main --head HEAD'");
  return 'written';
}

export const initCommand = new Command('init')
  .description('Write a default policy pack')
  .option('--output <path>', 'Where to write the policy pack', DEFAULT_POLICY_PACK_PATH)
  .option('--force', 'Overwrite an existing policy pack', false)
  .addHelpText(
    'after',
    `
Examples:
  $ docgov init                          Write docgov-policy.yml
  $ docgov init --output policies/sdk.yml
  $ docgov init --force                  Overwrite without prompting

The pack holds:
  docs_contract   interface and doc patterns for contract-check
  drift           OpenAPI, SDK and reference-doc patterns for drift-check
  kpi_sla         thresholds for kpi-sla-evaluate
  gaps            collector tuning for gaps analyze and kpi snapshot
`
  )
  .action(async function (this: Command) {
    const options = this.optsWithGlobals<InitOptions>();
    try {
      const outcome = await runInit(options);
      process.exitCode = outcome === 'written' ? 0 : 1;
    } catch (error) {
      handleError(error);
    }
  });
