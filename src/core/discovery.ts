import fs from 'fs-extra';
import path from 'path';
import { glob } from 'glob';
import { replaceExtension, toPosixPath } from './paths';

export const SOURCE_EXTENSION = '.v';
export const METADATA_EXTENSION = '.glob';

/** Build output directories searched for metadata, in order, after the source's own directory. */
export const BUILD_DIRS = ['_build/default', '_build', '.coq-native'] as const;

const IGNORED = [
  'node_modules/**',
  '**/node_modules/**',
  '.git/**',
  '**/.git/**',
  '_build/**',
  '**/_build/**',
  '_opam/**',
  '**/_opam/**',
  '.coq-native/**',
  '**/.coq-native/**',
];

/** Source files under `root`, as sorted posix paths relative to it. */
export async function discoverSources(root: string): Promise<string[]> {
  const files = await glob(`**/*${SOURCE_EXTENSION}`, {
    cwd: root,
    nodir: true,
    ignore: IGNORED,
  });
  return files.map(toPosixPath).sort();
}

export interface MetadataPair {
  /** Relative to the project root. */
  source: string;
  /** Absolute path of the metadata file. */
  metadata: string;
}

export interface MetadataDiscovery {
  pairs: MetadataPair[];
  /** Sources with no metadata anywhere. */
  missing: string[];
}

export interface MetadataDiscoveryOptions {
  globDir?: string;
}

function metadataCandidates(root: string, source: string, globDir?: string): string[] {
  const rel = replaceExtension(source, METADATA_EXTENSION);
  const out: string[] = [];
  if (globDir) {
    const dir = path.resolve(root, globDir);
    out.push(path.join(dir, rel), path.join(dir, path.posix.basename(rel)));
  }
  out.push(path.join(root, rel));
  for (const build of BUILD_DIRS) out.push(path.join(root, build, rel));
  return out;
}

export async function findMetadataFor(root: string, source: string, globDir?: string): Promise<string | null> {
  for (const candidate of metadataCandidates(root, source, globDir)) {
    if (await fs.pathExists(candidate)) return candidate;
  }
  return null;
}

export async function discoverMetadataPairs(root: string, options: MetadataDiscoveryOptions = {}): Promise<MetadataDiscovery> {
  const sources = await discoverSources(root);
  const pairs: MetadataPair[] = [];
  const missing: string[] = [];
  for (const source of sources) {
    const metadata = await findMetadataFor(root, source, options.globDir);
    if (metadata) pairs.push({ source, metadata });
    else missing.push(source);
  }
  return { pairs, missing };
}
