/**
 * docgov contract-check command
 *
 * Blocks a change set that touches the public interface without touching
 * documentation. Exit 0 when satisfied, 1 on a violation, 2 on errors.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import type { ContractCheckOptions, ContractViolation } from '../../types/index.js';
import { DEFAULT_POLICY_PACK_PATH, loadPolicyPack } from '../../core/policy/policy-pack.js';
import { GitVersionControl } from '../../core/changes/git-diff.js';
import type { VersionControl } from '../../core/changes/git-diff.js';
import { ChangeSetClassifier } from '../../core/changes/change-classifier.js';
import { evaluateContract } from '../../core/gates/contract-gate.js';
import { render } from '../../core/report/report-emitter.js';
import { writeReportFile } from '../../core/report/report-files.js';

export const CONTRACT_MESSAGES = {
  blocked: 'Blocking PR: public interface changed but docs were not updated.',
  passed: 'Docs contract check passed.',
} as const;

/**
 * Classify the change set, print the verdict and optionally write it as JSON.
 * The version-control collaborator defaults to git in `options.repo`.
 */
export async function runContractCheck(
  options: ContractCheckOptions,
  vcs: VersionControl = new GitVersionControl(options.repo)
): Promise<ContractViolation> {
  const pack = await loadPolicyPack(options.policyPack);
  logger.debug(`Policy pack: ${pack.name} (${pack.source})`);

  logger.analysis(`Classifying ${options.base}...${options.head}`);
  const classified = await new ChangeSetClassifier(vcs, pack).classify(options.base, options.head);
  const result = evaluateContract(classified);

  console.log(`Changed files: ${classified.length}`);
  console.log(`Interface files changed: ${result.interfaceFilesChanged.length}`);
  console.log(`Docs files changed: ${result.docFilesChanged.length}`);
  for (const path of result.interfaceFilesChanged) {
    logger.listItem(path, 1);
  }

  if (options.jsonOutput) {
    await writeReportFile(options.jsonOutput, render({ kind: 'contract', data: result }, 'json'));
  }

  if (result.satisfied) {
    console.log(CONTRACT_MESSAGES.passed);
  } else {
    console.log(CONTRACT_MESSAGES.blocked);
    console.log(result.explanation);
  }
  return result;
}

export const contractCheckCommand = new Command('contract-check')
  .description('Fail when public interface files change without a docs change')
  .requiredOption('--base <ref>', 'Base revision of the change set')
  .requiredOption('--head <ref>', 'Head revision of the change set')
  .option('--policy-pack <path>', 'Policy pack file', DEFAULT_POLICY_PACK_PATH)
  .option('--repo <path>', 'Repository to diff', '.')
  .option('--json-output <path>', 'Also write the verdict as JSON')
  .addHelpText(
    'after',
    `
Examples:
  $ docgov contract-check --base origin/main --head HEAD
  $ docgov contract-check --base v1.4.0 --head HEAD --policy-pack policies/sdk.yml

Exit codes:
  0  No interface change, or docs changed alongside it
  1  Interface changed without a docs change
  2  Bad policy pack, unresolvable ref or other error
`
  )
  .action(async function (this: Command) {
    const options = this.optsWithGlobals<ContractCheckOptions>();
    try {
      const result = await runContractCheck(options);
      process.exitCode = result.satisfied ? 0 : 1;
    } catch (error) {
      handleError(error);
    }
  });
