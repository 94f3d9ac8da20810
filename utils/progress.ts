import type { ProcessingStats, ProcessingStatus } from '../types';

const STEPS: readonly ProcessingStatus[] = ['extracting', 'cleaning', 'synthesizing', 'stitching', 'timing'];

export const progressPercentage = (stats: ProcessingStats): number => {
  switch (stats.status) {
    case 'extracting':
      return 5;
    case 'cleaning':
      return 15;
    case 'synthesizing':
      return 20 + (stats.processedUnits / (stats.totalUnits || 1)) * 65;
    case 'stitching':
      return 90;
    case 'timing':
      return 95;
    case 'complete':
      return 100;
    case 'idle':
    case 'error':
      return 0;
  }
};

/** One-line status for terminal output, e.g. "[53%] Step 3 of 5 · Synthesizing audio (2/4)". */
export const formatProgress = (stats: ProcessingStats): string => {
  if (stats.status === 'error') return `Error: ${stats.errorMessage ?? 'unknown error'}`;
  if (stats.status === 'complete') return `[100%] ${stats.statusMessage ?? 'Complete'}`;

  const percentage = Math.round(progressPercentage(stats));
  const step = STEPS.indexOf(stats.status);
  const label = stats.statusMessage ?? 'Initializing...';
  const units = stats.totalUnits > 0 ? ` (${stats.processedUnits}/${stats.totalUnits})` : '';

  return step === -1 ? `[${percentage}%] ${label}` : `[${percentage}%] Step ${step + 1} of ${STEPS.length} · ${label}${units}`;
};
