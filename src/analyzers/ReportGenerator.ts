/**
 * ReportGenerator - narrative summary of a session
 *
 * Turns the per-window diagnostics of a locked exercise into a short
 * multi-line report: score, quality tier, the most frequent fault and the
 * cue that corrects it.
 */

import { getAdvice, getExerciseDefinition } from '../exercises';
import {
  type DiagnosticResult,
  type ExerciseLabel,
  isCatalogueExercise,
} from '../types/exercise';

export type QualityTier = 'excellent' | 'good' | 'needs-improvement';

export interface ViolationCount {
  readonly violation: string;
  readonly windows: number;
}

export interface ReportSummary {
  readonly totalWindows: number;
  readonly correctWindows: number;
  /** Percentage of correct windows, 0 when nothing was analyzed */
  readonly score: number;
  readonly tier: QualityTier;
  readonly topViolation: ViolationCount | null;
}

const TIER_TEXT: Record<QualityTier, string> = {
  excellent: 'Excellent form. Keep it up.',
  good: 'Good form with some deviations.',
  'needs-improvement': 'Needs improvement. Focus on the cue below.',
};

export function tierForScore(score: number): QualityTier {
  if (score > 90) return 'excellent';
  if (score > 60) return 'good';
  return 'needs-improvement';
}

/**
 * Count how many windows showed each violation; first seen wins ties
 */
export function mostFrequentViolation(
  diagnostics: readonly DiagnosticResult[]
): ViolationCount | null {
  const counts = new Map<string, number>();
  for (const diagnostic of diagnostics) {
    for (const violation of diagnostic.violations) {
      counts.set(violation, (counts.get(violation) ?? 0) + 1);
    }
  }

  let top: ViolationCount | null = null;
  for (const [violation, windows] of counts) {
    if (top === null || windows > top.windows) {
      top = { violation, windows };
    }
  }
  return top;
}

export function summarizeDiagnostics(
  diagnostics: readonly DiagnosticResult[]
): ReportSummary {
  const totalWindows = diagnostics.length;
  const correctWindows = diagnostics.filter((diagnostic) => diagnostic.isCorrect).length;
  const score = totalWindows === 0 ? 0 : (correctWindows / totalWindows) * 100;

  return {
    totalWindows,
    correctWindows,
    score,
    tier: tierForScore(score),
    topViolation: mostFrequentViolation(diagnostics),
  };
}

function displayName(label: ExerciseLabel): string {
  return isCatalogueExercise(label)
    ? getExerciseDefinition(label).name
    : 'No exercise detected';
}

/**
 * Build the text report for a session
 */
export function generateReport(
  exercise: ExerciseLabel,
  diagnostics: readonly DiagnosticResult[]
): string {
  const lines = [`Exercise: ${displayName(exercise)}`];

  if (diagnostics.length === 0) {
    lines.push('No windows analyzed.');
    return lines.join('\n');
  }

  const summary = summarizeDiagnostics(diagnostics);
  lines.push(
    `Score: ${Math.round(summary.score)}% (${summary.correctWindows}/${summary.totalWindows} windows correct)`,
    `Assessment: ${TIER_TEXT[summary.tier]}`
  );

  const top = summary.topViolation;
  if (top === null) {
    lines.push('No recurring issues detected.');
    return lines.join('\n');
  }

  lines.push(
    `Most frequent issue: ${top.violation} (${top.windows} of ${summary.totalWindows} windows)`
  );

  const advice = isCatalogueExercise(exercise)
    ? getAdvice(exercise, top.violation)
    : undefined;
  if (advice !== undefined) {
    lines.push(`Recommendation: ${advice}`);
  }

  return lines.join('\n');
}
