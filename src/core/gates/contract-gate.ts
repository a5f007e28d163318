/**
 * Docs contract gate
 *
 * An interface change must ship with some documentation change in the same
 * change set. The rule counts files; it does not correlate an interface file
 * with the doc that describes it.
 */

import type { ClassifiedChange, ContractViolation } from '../../types/index.js';
import { pathsWithLabel } from '../changes/change-classifier.js';

export function evaluateContract(classified: readonly ClassifiedChange[]): ContractViolation {
  const interfaceFilesChanged = pathsWithLabel(classified, 'interface');
  const docFilesChanged = pathsWithLabel(classified, 'doc');
  const satisfied = interfaceFilesChanged.length === 0 || docFilesChanged.length > 0;

  let explanation: string;
  if (interfaceFilesChanged.length === 0) {
    explanation = 'No public interface files changed; docs contract not applicable.';
  } else if (satisfied) {
    explanation =
      `${interfaceFilesChanged.length} interface file(s) changed with ` +
      `${docFilesChanged.length} documentation file(s) updated.`;
  } else {
    explanation =
      `Public interface changed but docs were not updated: ` +
      `${interfaceFilesChanged.join(', ')}. No documentation files changed.`;
  }

  return { interfaceFilesChanged, docFilesChanged, satisfied, explanation };
}
