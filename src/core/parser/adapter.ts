import type { ExtractionConfig } from '../scan/config';
import type { FileScanResult, FrontEndId, SourceInput } from '../types';

/**
 * A scanning strategy. Both front-ends recover the same symbol shape from a
 * single file and never look at any other file, so files can be scanned in
 * any order and concurrently. Throwing marks the whole file as unusable.
 */
export interface FrontEnd {
  readonly id: FrontEndId;
  scanFile(input: SourceInput, config: ExtractionConfig): FileScanResult;
}

export function assertTextContent(input: SourceInput): void {
  if (input.content.includes(0)) {
    throw new Error(`${input.path} does not look like a text file (NUL byte found)`);
  }
}
