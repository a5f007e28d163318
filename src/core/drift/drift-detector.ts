/**
 * API/SDK drift detector
 *
 * Flags a change set that touches OpenAPI documents or SDK/client code
 * without touching any reference documentation. Pure: the caller supplies
 * the classification and writes the reports.
 */

import type { ClassifiedChange, DriftReport } from '../../types/index.js';
import { pathsWithLabel } from '../changes/change-classifier.js';

export const DRIFT_SUMMARIES = {
  noChanges: 'No API/SDK signature changes detected.',
  documented: 'API/SDK changes are accompanied by reference docs updates.',
  drift: 'API/SDK changes detected without reference documentation updates.',
} as const;

export function evaluateDrift(classified: readonly ClassifiedChange[]): DriftReport {
  const openapiChanges = pathsWithLabel(classified, 'openapi');
  const sdkChanges = pathsWithLabel(classified, 'sdk');
  const referenceDocChanges = pathsWithLabel(classified, 'referenceDoc');

  const surfaceChanged = openapiChanges.length > 0 || sdkChanges.length > 0;

  if (!surfaceChanged) {
    return { status: 'OK', summary: DRIFT_SUMMARIES.noChanges, openapiChanges, sdkChanges, referenceDocChanges };
  }
  if (referenceDocChanges.length > 0) {
    return { status: 'OK', summary: DRIFT_SUMMARIES.documented, openapiChanges, sdkChanges, referenceDocChanges };
  }
  return { status: 'DRIFT', summary: DRIFT_SUMMARIES.drift, openapiChanges, sdkChanges, referenceDocChanges };
}
