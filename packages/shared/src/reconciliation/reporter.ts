/**
 * Reconciliation Reporter
 *
 * Reduces document statuses and divergences to the verdict the
 * surrounding orchestration acts on. A step is only recommended when a
 * re-run of that stage would find work to do.
 */

import type { ActionStage, ActionStep, Divergence, DocumentStatus, Verdict } from '../types';
import { spreadsheetTarget } from './divergence';

export interface VerdictInput {
  documents: DocumentStatus[];
  divergences: Divergence[];
  ocrMaxAttempts: number;
}

const STAGE_ORDER: readonly ActionStage[] = [
  'extract',
  'ocr',
  'manual-review',
  'resolve-divergences',
  'update-spreadsheet',
];

interface StageTarget {
  provider: number;
  competence: string | null;
}

function documentStage(document: DocumentStatus, ocrMaxAttempts: number): ActionStage | null {
  switch (document.status) {
    case 'queued':
      return 'extract';
    case 'pending-ocr':
      return 'ocr';
    case 'ocr-exhausted':
      return document.ocr_attempts < ocrMaxAttempts ? 'ocr' : 'manual-review';
    case 'needs-manual-review':
    case 'classification-failed':
      return 'manual-review';
    case 'extracted':
    case 'filtered-out':
    case 'reviewed':
      return null;
  }
}

function divergenceStage(divergence: Divergence): ActionStage | null {
  if (divergence.classification === 'value-mismatch' && divergence.resolution === null) {
    return 'resolve-divergences';
  }
  if (spreadsheetTarget(divergence) !== null) {
    return 'update-spreadsheet';
  }
  return null;
}

function toStep(stage: ActionStage, targets: StageTarget[]): ActionStep {
  const providers = Array.from(new Set(targets.map((t) => t.provider))).sort((a, b) => a - b);
  const competences = Array.from(
    new Set(targets.map((t) => t.competence).filter((c): c is string => c !== null))
  ).sort();
  return { stage, providers, competences, count: targets.length };
}

export function buildVerdict(input: VerdictInput): Verdict {
  const byStage = new Map<ActionStage, StageTarget[]>();
  const add = (stage: ActionStage | null, target: StageTarget): void => {
    if (stage === null) return;
    const targets = byStage.get(stage);
    if (targets) {
      targets.push(target);
    } else {
      byStage.set(stage, [target]);
    }
  };

  for (const document of input.documents) {
    add(documentStage(document, input.ocrMaxAttempts), {
      provider: document.provider,
      competence: document.competence,
    });
  }
  for (const divergence of input.divergences) {
    add(divergenceStage(divergence), { provider: divergence.provider, competence: divergence.competence });
  }

  const steps: ActionStep[] = [];
  for (const stage of STAGE_ORDER) {
    const targets = byStage.get(stage);
    if (targets) steps.push(toStep(stage, targets));
  }

  return steps.length === 0 ? { status: 'up-to-date' } : { status: 'action-needed', steps };
}
