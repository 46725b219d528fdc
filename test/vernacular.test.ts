import test from 'node:test';
import assert from 'node:assert/strict';
import { HeuristicFrontEnd, hasInlineBody } from '../src/core/parser/vernacular';
import { defaultExtractionConfig, type ExtractionConfig } from '../src/core/scan/config';

function scan(text: string, overrides: Partial<ExtractionConfig> = {}, file = 'A.v') {
  return new HeuristicFrontEnd().scanFile(
    { path: file, content: Buffer.from(text, 'utf-8') },
    { ...defaultExtractionConfig(), ...overrides },
  );
}

test('a lemma closed by Qed is proved', () => {
  const res = scan('Lemma foo : True. Proof. exact I. Qed.');
  assert.equal(res.symbols.length, 1);
  const [foo] = res.symbols;
  assert.equal(foo.name, 'foo');
  assert.equal(foo.qualifiedName, 'foo');
  assert.equal(foo.kind, 'provable');
  assert.equal(foo.keyword, 'lemma');
  assert.equal(foo.status, 'proved');
  assert.equal(foo.line, 1);
  assert.equal(foo.statement, 'Lemma foo : True.');
  assert.deepEqual(res.diagnostics, []);
});

test('an axiom is assumed', () => {
  const [bar] = scan('Axiom bar : False.').symbols;
  assert.equal(bar.status, 'assumed');
  assert.equal(bar.kind, 'assumption');
  assert.equal(bar.keyword, 'axiom');
  assert.equal(bar.statement, 'Axiom bar : False.');
});

test('an inline body is defined without waiting for a terminator', () => {
  const res = scan('Definition x := 5.\nLemma y : True. Proof. Qed.');
  assert.deepEqual(
    res.symbols.map((s) => [s.name, s.status]),
    [['x', 'defined'], ['y', 'proved']],
  );
  assert.deepEqual(res.diagnostics, []);
});

test('only a top-level := is an inline body', () => {
  assert.equal(hasInlineBody(' : nat := 5.'), true);
  assert.equal(hasInlineBody(' (x : nat) : nat := let y := x in y.'), true);
  assert.equal(hasInlineBody(' : C := { f := 1 }.'), true);
  assert.equal(hasInlineBody(' : let y := 0 in y = 0.'), false);
  assert.equal(hasInlineBody(' : {| f := 1 |} = {| f := 1 |}.'), false);
  assert.equal(hasInlineBody(' : (fun (x : nat) => let z := x in z) 0 = 0.'), false);
  assert.equal(hasInlineBody(' : "a := b" = "a := b".'), false);
  assert.equal(hasInlineBody(' : inside = 0.'), false);
});

test('a := inside the statement does not hide the proof', () => {
  const res = scan(
    [
      'Lemma foo : let y := 0 in y = 0. Proof. Admitted.',
      'Lemma r : {| f := 1 |} = {| f := 1 |}. Proof. reflexivity. Qed.',
    ].join('\n'),
  );
  assert.deepEqual(
    res.symbols.map((s) => [s.name, s.status]),
    [['foo', 'admitted'], ['r', 'proved']],
  );
  assert.deepEqual(res.diagnostics, []);
});

test('terminators map to statuses', () => {
  const res = scan([
    'Theorem t : 1 = 1. Proof. Admitted.',
    'Lemma l : True. Proof. Abort.',
    'Definition f : nat. Proof. exact 0. Defined.',
    'Instance i : C nat := {}.',
  ].join('\n'));
  assert.deepEqual(
    res.symbols.map((s) => [s.name, s.kind, s.status]),
    [
      ['t', 'provable', 'admitted'],
      ['l', 'provable', 'aborted'],
      ['f', 'definition', 'defined'],
      ['i', 'instance', 'defined'],
    ],
  );
});

test('a proof without an explicit Proof sentence still finishes', () => {
  const [r] = scan('Lemma r : True. exact I. Qed.').symbols;
  assert.equal(r.status, 'proved');
  assert.equal(r.referenceText, 'Lemma r : True.\nexact I.');
});

test('proof text is kept for resolution but not in the statement', () => {
  const [baz] = scan('Lemma baz : False. Proof. apply bar. Qed.').symbols;
  assert.equal(baz.statement, 'Lemma baz : False.');
  assert.equal(baz.referenceText, 'Lemma baz : False.\napply bar.');
});

test('commented terminators are ignored', () => {
  const [c] = scan('Lemma c : True. (* Qed. *) Proof. Admitted.').symbols;
  assert.equal(c.status, 'admitted');
});

test('scopes qualify names', () => {
  const res = scan('Module M. Section S. Lemma a : True. Proof. Qed. End S. End M. Lemma b : True. Proof. Qed.');
  assert.deepEqual(res.symbols.map((s) => s.qualifiedName), ['M.S.a', 'b']);
});

test('module aliases open no scope and Import is not a scope name', () => {
  const res = scan('Module N := M. Definition c := 1. Module Import K. Definition d := 1. End K.');
  assert.deepEqual(res.symbols.map((s) => s.qualifiedName), ['c', 'K.d']);
});

test('End naming a deeper scope unwinds to it', () => {
  const res = scan('Module M. Section S. End M. Definition e := 1.');
  assert.equal(res.symbols[0].qualifiedName, 'e');
  assert.deepEqual(res.diagnostics, [
    { file: 'A.v', severity: 'warning', line: 1, message: 'End M also closes S' },
  ]);
});

test('End naming no open scope is ignored', () => {
  const res = scan('Module M. End Z. Definition e := 1. End M.');
  assert.equal(res.symbols[0].qualifiedName, 'M.e');
  assert.deepEqual(res.diagnostics, [
    { file: 'A.v', severity: 'warning', line: 1, message: 'End Z does not match any open scope' },
  ]);
});

test('imports are recorded and produce no symbol', () => {
  const res = scan('From Coq Require Import Arith List.\nRequire Export Foo.\nImport Bar.');
  assert.deepEqual(res.file.imports, ['Coq.Arith', 'Coq.List', 'Foo', 'Bar']);
  assert.deepEqual(res.symbols, []);
});

test('unterminated proofs follow the configured policy', () => {
  const text = 'Lemma u : True. Proof. intros.';
  const strict = scan(text);
  assert.equal(strict.symbols[0].status, 'unterminated');
  assert.deepEqual(strict.diagnostics, [
    { file: 'A.v', severity: 'warning', line: 1, message: 'proof of u has no terminator (end of file)' },
  ]);
  assert.equal(scan(text, { unterminatedProof: 'proved' }).symbols[0].status, 'proved');
});

test('a new declaration supersedes a statement with no proof', () => {
  const res = scan('Lemma p : True.\nLemma q : True. Proof. Qed.');
  assert.deepEqual(
    res.symbols.map((s) => [s.name, s.status]),
    [['p', 'unterminated'], ['q', 'proved']],
  );
  assert.equal(res.diagnostics[0].message, 'proof of p has no terminator (superseded by line 2)');
});

test('Goal proofs are skipped', () => {
  const res = scan('Goal True. Proof. exact I. Qed. Lemma g : True. Proof. Qed.');
  assert.deepEqual(res.symbols.map((s) => [s.name, s.status]), [['g', 'proved']]);
});

test('prefixes and multi-word keywords', () => {
  const res = scan('Local Definition ld := 1.\nProgram Definition pd := 2.');
  assert.deepEqual(
    res.symbols.map((s) => [s.name, s.keyword, s.kind, s.statement, s.line]),
    [
      ['ld', 'definition', 'definition', 'Definition ld := 1.', 1],
      ['pd', 'program definition', 'definition', 'Program Definition pd := 2.', 2],
    ],
  );
});

test('statements are truncated with a marker', () => {
  const [x] = scan('Definition x := 12345678901.', { maxStatementLength: 10 }).symbols;
  assert.equal(x.statement, 'Definition ...');
});

test('line numbers survive comments spanning lines', () => {
  const res = scan('(* a\nb *)\nDefinition a := 1.\n\nLemma b : True.\nProof. Qed.');
  assert.deepEqual(res.symbols.map((s) => s.line), [3, 5]);
});

test('binary content is rejected', () => {
  assert.throws(
    () => new HeuristicFrontEnd().scanFile({ path: 'bin.v', content: Buffer.from([0x4c, 0x00, 0x41]) }, defaultExtractionConfig()),
    /NUL byte/,
  );
});

test('file info lists declared symbols with posix paths', () => {
  const res = scan('Definition a := 1.', {}, 'theories\\Sub\\A.v');
  assert.equal(res.file.path, 'theories/Sub/A.v');
  assert.deepEqual(res.file.symbols, ['a']);
  assert.equal(res.symbols[0].file, 'theories/Sub/A.v');
});
