/**
 * Progress reporting shared by the removal and backup executors.
 */

export interface OperationProgress {
  /** processed / total, in [0, 1]. */
  fraction: number;
  processed: number;
  total: number;
  message: string;
}

export type ProgressCallback = (progress: OperationProgress) => void;

export function progressOf(processed: number, total: number, message: string): OperationProgress {
  return {
    fraction: total === 0 ? 1 : processed / total,
    processed,
    total,
    message,
  };
}

export function completionMessage(verb: 'removed' | 'backed up', count: number, success: boolean): string {
  return success ? `Successfully ${verb} ${String(count)} plugin(s)` : 'Completed with some errors';
}
