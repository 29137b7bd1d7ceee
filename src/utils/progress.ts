/**
 * Progress information for long-running sync operations
 */
export interface ProgressInfo {
  stage: string; // e.g. "artists", "releases", "pause"
  current: number;
  total: number | null; // null while the remote total is unknown
  currentPage?: number;
  message?: string;
}

export type ProgressCallback = (progress: ProgressInfo) => void;

export const noopProgress: ProgressCallback = () => {
  // No operation
};

export function getPercentage(progress: ProgressInfo): number | null {
  if (progress.total === null) return null;
  if (progress.total === 0) return 100;
  return Math.round((progress.current / progress.total) * 100);
}

/**
 * Format progress as "current/total (pct%)", or just the count when no total is known
 */
export function formatProgress(progress: ProgressInfo): string {
  const percentage = getPercentage(progress);
  if (percentage === null) {
    return `${progress.current}`;
  }
  return `${progress.current}/${progress.total} (${percentage}%)`;
}
