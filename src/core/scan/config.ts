import os from 'os';

export interface ScanConfig {
  /** Maximum number of files scanned concurrently. */
  workerCount: number;
  /** Files are handed to the scheduler in batches of this size. */
  batchSize: number;
}

/**
 * What a provable declaration becomes when its proof never reaches a
 * terminator before the end of the file (or the scan window).
 */
export type UnterminatedProofPolicy = 'unterminated' | 'proved';

export interface ExtractionConfig {
  unterminatedProof: UnterminatedProofPolicy;
  maxStatementLength: number;
  /** How far before a reported definition the metadata scanner looks for its keyword. */
  keywordWindowBytes: number;
  /** Upper bound on the bytes scanned after a statement when looking for its proof terminator. */
  proofScanLimitBytes: number;
}

export interface AnalysisRuntimeConfig {
  scan: ScanConfig;
  extraction: ExtractionConfig;
}

export type AnalysisConfigOverrides = {
  scan?: Partial<ScanConfig>;
  extraction?: Partial<ExtractionConfig>;
};

export function defaultScanConfig(): ScanConfig {
  const cpuCount = Math.max(1, os.cpus()?.length ?? 1);
  return {
    workerCount: Math.max(1, cpuCount - 1),
    batchSize: 32,
  };
}

export function defaultExtractionConfig(): ExtractionConfig {
  return {
    unterminatedProof: 'unterminated',
    maxStatementLength: 2000,
    keywordWindowBytes: 300,
    proofScanLimitBytes: 500_000,
  };
}

export function defaultAnalysisRuntimeConfig(): AnalysisRuntimeConfig {
  return {
    scan: defaultScanConfig(),
    extraction: defaultExtractionConfig(),
  };
}

export function mergeRuntimeConfig(overrides?: AnalysisConfigOverrides): AnalysisRuntimeConfig {
  const defaults = defaultAnalysisRuntimeConfig();
  if (!overrides) return defaults;
  const merged: AnalysisRuntimeConfig = {
    scan: { ...defaults.scan, ...overrides.scan },
    extraction: { ...defaults.extraction, ...overrides.extraction },
  };
  merged.scan.workerCount = Math.max(1, Math.floor(merged.scan.workerCount));
  merged.scan.batchSize = Math.max(1, Math.floor(merged.scan.batchSize));
  merged.extraction.maxStatementLength = Math.max(1, merged.extraction.maxStatementLength);
  merged.extraction.keywordWindowBytes = Math.max(0, merged.extraction.keywordWindowBytes);
  merged.extraction.proofScanLimitBytes = Math.max(0, merged.extraction.proofScanLimitBytes);
  return merged;
}
