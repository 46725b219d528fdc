import type { FrontEnd } from '../parser/adapter';
import type { FileScanResult, ScanDiagnostic, SourceInput } from '../types';
import { createLogger, serializeError, type Logger } from '../log';
import { toPosixPath } from '../paths';
import type { AnalysisRuntimeConfig } from './config';

/** A file to scan. Reading is deferred so that at most `workerCount` files are held at once. */
export interface ScanTask {
  path: string;
  load: () => Promise<SourceInput>;
}

export interface ParallelScanOptions {
  tasks: readonly ScanTask[];
  frontEnd: FrontEnd;
  config: AnalysisRuntimeConfig;
  log?: Logger;
  onProgress?: (p: { totalFiles: number; processedFiles: number; currentFile?: string }) => void;
}

export interface ParallelScanResult {
  /** Successful scans, in task order. */
  scans: FileScanResult[];
  /** One entry per skipped file. */
  failures: ScanDiagnostic[];
}

export async function runParallelScan(options: ParallelScanOptions): Promise<ParallelScanResult> {
  const log = options.log ?? createLogger({ component: 'scan' });
  const { frontEnd, config } = options;
  const totalFiles = options.tasks.length;
  const workerCount = Math.max(1, config.scan.workerCount);
  const batchSize = Math.max(1, config.scan.batchSize);
  const results: Array<FileScanResult | undefined> = new Array(totalFiles);
  const failures: Array<ScanDiagnostic | undefined> = new Array(totalFiles);
  let processedFiles = 0;

  const processTask = async (index: number): Promise<void> => {
    const task = options.tasks[index];
    const file = toPosixPath(task.path);
    try {
      const input = await task.load();
      results[index] = frontEnd.scanFile(input, config.extraction);
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      log.warn('scan_file_failed', { file, frontEnd: frontEnd.id, err: serializeError(e) });
      failures[index] = { file, severity: 'error', message: `skipped: ${message}` };
    } finally {
      processedFiles++;
      options.onProgress?.({ totalFiles, processedFiles, currentFile: file });
    }
  };

  const runBatch = async (batch: number[]): Promise<void> => {
    const queue = batch.slice();
    const active = new Set<Promise<void>>();
    const scheduleNext = (): void => {
      while (active.size < workerCount && queue.length > 0) {
        const index = queue.shift();
        if (index === undefined) break;
        const task = processTask(index).then(() => {
          active.delete(task);
        });
        active.add(task);
      }
    };

    scheduleNext();
    while (active.size > 0) {
      await Promise.race(active);
      scheduleNext();
    }
  };

  for (let start = 0; start < totalFiles; start += batchSize) {
    const batch: number[] = [];
    for (let i = start; i < Math.min(totalFiles, start + batchSize); i++) batch.push(i);
    await runBatch(batch);
  }

  return {
    scans: results.filter((r): r is FileScanResult => r !== undefined),
    failures: failures.filter((f): f is ScanDiagnostic => f !== undefined),
  };
}
