import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { exitCodeFor, runHandler } from '../src/cli/types';

process.env.PROOF_DEPS_LOG_LEVEL = 'silent';

const PROJECT: Record<string, string> = {
  'theories/A.v': 'Lemma s : True. Admitted.\nDefinition a := s.\nDefinition leaf := 0.',
  'theories/B.v': 'Require Import A.\nLemma b : True. Proof. apply a. Qed.',
};

async function withProject(fn: (root: string) => Promise<void>): Promise<void> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'proof-deps-cli-'));
  try {
    for (const [rel, text] of Object.entries(PROJECT)) await fs.outputFile(path.join(root, rel), text);
    await fn(root);
  } finally {
    await fs.remove(root);
  }
}

test('analyze reports statistics for the project', async () => {
  await withProject(async (root) => {
    const res = await runHandler('analyze', { path: root, mode: 'heuristic', symbols: true });
    assert.equal(res.ok, true);
    assert.equal(exitCodeFor(res), 0);
    assert.equal(res.root, path.resolve(root));
    assert.equal(res.frontEnd, 'heuristic');
    assert.deepEqual(res.diagnostics, []);
    assert.ok(Array.isArray(res.symbols) && res.symbols.length === 4);
  });
});

test('graph queries answer from a fresh analysis', async () => {
  await withProject(async (root) => {
    assert.deepEqual(await runHandler('graph:deps', { path: root, name: 'b' }), {
      ok: true,
      name: 'b',
      dependencies: ['a'],
      unresolvedInternal: [],
      external: [],
    });
    assert.deepEqual(await runHandler('graph:dependents', { path: root, name: 's', transitive: true }), {
      ok: true,
      name: 's',
      transitive: true,
      count: 2,
      dependents: ['a', 'b'],
    });
    assert.deepEqual(await runHandler('graph:dependents', { path: root, name: 's' }), {
      ok: true,
      name: 's',
      transitive: false,
      count: 1,
      dependents: ['a'],
    });
    assert.deepEqual(await runHandler('graph:blast', { path: root }), {
      ok: true,
      count: 1,
      ranking: [{ qualifiedName: 's', blastRadius: 2 }],
    });
    assert.deepEqual(await runHandler('graph:blast', { path: root, name: 's', limit: '1' }), {
      ok: true,
      name: 's',
      status: 'admitted',
      blastRadius: 2,
      affected: ['a'],
    });
    assert.deepEqual(await runHandler('graph:unused', { path: root }), { ok: true, count: 2, symbols: ['b', 'leaf'] });

    const tainted = await runHandler('graph:tainted', { path: root });
    assert.equal(tainted.count, 3);
    assert.deepEqual(tainted.symbols, [
      { qualifiedName: 'a', kind: 'definition', keyword: 'definition', status: 'defined', file: 'theories/A.v', line: 2, tainted: true, taintSources: ['s'] },
      { qualifiedName: 'b', kind: 'provable', keyword: 'lemma', status: 'proved', file: 'theories/B.v', line: 2, tainted: true, taintSources: ['s'] },
      { qualifiedName: 's', kind: 'provable', keyword: 'lemma', status: 'admitted', file: 'theories/A.v', line: 1, tainted: true, taintSources: ['s'] },
    ]);

    const show = await runHandler('graph:show', { path: root, name: 'leaf' });
    assert.equal(show.blastRadius, 0);
    assert.equal(show.unused, true);
  });
});

test('an unknown symbol is a reported failure', async () => {
  await withProject(async (root) => {
    const res = await runHandler('graph:show', { path: root, name: 'missing' });
    assert.equal(res.ok, false);
    assert.equal(res.ok === false && res.reason, 'symbol_not_found');
    assert.equal(res.message, 'No symbol named missing');
    assert.equal(exitCodeFor(res), 2);
  });
});

test('an empty project has no input', async () => {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), 'proof-deps-cli-empty-'));
  try {
    const res = await runHandler('analyze', { path: root });
    assert.equal(res.ok === false && res.reason, 'no_input');
    assert.equal(exitCodeFor(res), 2);
  } finally {
    await fs.remove(root);
  }
});

test('invalid arguments and unknown commands are usage errors', async () => {
  const invalid = await runHandler('analyze', { path: '.', workers: '0' });
  assert.equal(invalid.ok === false && invalid.reason, 'validation_error');
  const errors = invalid.errors;
  assert.ok(Array.isArray(errors));
  assert.deepEqual(errors.map((e: unknown) => (typeof e === 'object' && e !== null && 'path' in e ? e.path : null)), ['workers']);
  assert.equal(exitCodeFor(invalid), 1);

  const badMode = await runHandler('graph:unused', { mode: 'guess' });
  assert.equal(badMode.ok === false && badMode.reason, 'validation_error');

  const unknown = await runHandler('graph:nope', {});
  assert.equal(unknown.ok === false && unknown.reason, 'unknown_command');
  assert.equal(exitCodeFor(unknown), 1);
});

test('an export written by analyze answers later queries', async () => {
  await withProject(async (root) => {
    const out = path.join(root, 'out', 'graph.json');
    const res = await runHandler('analyze', { path: root, mode: 'heuristic', out });
    assert.equal(res.out, path.resolve(out));
    assert.ok(await fs.pathExists(out));

    const reloaded = await runHandler('analyze', { from: out });
    assert.equal(reloaded.from, path.resolve(out));
    assert.equal('root' in reloaded, false);
    assert.deepEqual(reloaded.stats, res.stats);

    await fs.remove(path.join(root, 'theories'));
    assert.deepEqual(await runHandler('graph:deps', { from: out, name: 'a' }), {
      ok: true,
      name: 'a',
      dependencies: ['s'],
      unresolvedInternal: [],
      external: [],
    });
  });
});

test('a missing or malformed export cannot be loaded', async () => {
  await withProject(async (root) => {
    const missing = await runHandler('graph:unused', { from: path.join(root, 'nope.json') });
    assert.equal(missing.ok === false && missing.reason, 'load_failed');
    assert.equal(exitCodeFor(missing), 2);

    const bad = path.join(root, 'bad.json');
    await fs.writeJSON(bad, { format_version: 1, symbols: 'none' });
    const malformed = await runHandler('graph:unused', { from: bad });
    assert.equal(malformed.ok === false && malformed.reason, 'load_failed');
  });
});
