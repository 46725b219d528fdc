import test from 'node:test';
import assert from 'node:assert/strict';
import type { MetadataReference, ScannedSymbol } from '../src/core/types';
import { referenceTokens, resolveStructural, resolveTextual } from '../src/core/graph/resolver';
import { assignUniqueNames, FIRST_REGISTERED_WINS, SymbolTable } from '../src/core/graph/symbolTable';

function sym(qualifiedName: string, extra: Partial<ScannedSymbol> = {}): ScannedSymbol {
  const name = qualifiedName.split('.').pop() ?? qualifiedName;
  return {
    name,
    qualifiedName,
    kind: 'definition',
    keyword: 'definition',
    status: 'defined',
    file: 'A.v',
    line: 1,
    statement: `Definition ${name} := 0.`,
    ...extra,
  };
}

function ref(modulePath: string, name: string, kindCode = 'def'): MetadataReference {
  return { modulePath, sectionPath: '', name, rawName: name, kindCode, byteStart: 0, byteEnd: 0 };
}

test('tokens keep dotted paths and skip string literals', () => {
  assert.deepEqual(referenceTokens('apply Nat.add_comm "x y" foo\'.'), ['apply', 'Nat.add_comm', "foo'"]);
});

test('short names follow the first-registered-wins rule', () => {
  const table = new SymbolTable([sym('A.foo'), sym('B.foo'), sym('bar')]);
  assert.equal(table.policy, FIRST_REGISTERED_WINS);
  assert.equal(table.getShort('foo')?.qualifiedName, 'A.foo');
  assert.equal(table.resolve('B.foo')?.qualifiedName, 'B.foo');
  assert.equal(table.resolve('foo')?.qualifiedName, 'A.foo');
  assert.deepEqual(table.collisions(), [{ name: 'foo', kept: 'A.foo', shadowed: ['B.foo'] }]);
});

test('registering a qualified name twice throws', () => {
  const table = new SymbolTable([sym('A.foo')]);
  assert.throws(() => table.register(sym('A.foo')), /duplicate qualified name: A\.foo/);
});

test('duplicate qualified names are made unique', () => {
  const res = assignUniqueNames([
    sym('foo', { file: 'a/A.v' }),
    sym('foo', { file: 'b/B.v', line: 3 }),
    sym('foo', { file: 'b/B.v', line: 7 }),
  ]);
  assert.deepEqual(res.symbols.map((s) => s.qualifiedName), ['foo', 'b.B.foo', 'b.B.foo#7']);
  assert.deepEqual(res.diagnostics.map((d) => d.message), [
    'foo is already declared; renamed to b.B.foo',
    'foo is already declared; renamed to b.B.foo#7',
  ]);
});

test('textual resolution looks up whole tokens and their components', () => {
  const table = new SymbolTable([sym('M.bar'), sym('x'), sym('user')]);
  const user = sym('user', { referenceText: 'Lemma user : True.\nrewrite M.bar; exact x.' });
  assert.deepEqual(resolveTextual(user, table).dependencies, ['M.bar', 'x']);
});

test('textual resolution never links a symbol to its own name', () => {
  const table = new SymbolTable([sym('M.foo'), sym('N.foo'), sym('S.s')]);
  const nFoo = sym('N.foo', { referenceText: 'Lemma foo : P.\napply foo.' });
  assert.deepEqual(resolveTextual(nFoo, table).dependencies, []);
  const s = sym('S.s', { referenceText: 'Definition s := S.s.' });
  assert.deepEqual(resolveTextual(s, table).dependencies, []);
});

test('textual resolution falls back to the statement', () => {
  const table = new SymbolTable([sym('nat_alias'), sym('two')]);
  const two = sym('two', { statement: 'Definition two : nat_alias := 2.' });
  assert.deepEqual(resolveTextual(two, table).dependencies, ['nat_alias']);
});

test('structural resolution tiers', () => {
  const table = new SymbolTable([sym('Lib.A.foo'), sym('Lib.B.bar'), sym('Lib.B.self')]);
  const self = sym('Lib.B.self', {
    references: [
      ref('Lib.A', 'foo'),
      ref('Lib.C', 'bar'),
      ref('Lib.A', 'ghost'),
      ref('Coq.Init.Logic', 'True', 'ind'),
      ref('Lib.A', 'foo'),
      ref('Lib.B', 'self'),
    ],
  });
  const res = resolveStructural(self, table, new Set(['Lib.A', 'Lib.B']));
  assert.deepEqual(res, {
    dependencies: ['Lib.A.foo', 'Lib.A.ghost', 'Lib.B.bar'],
    external: ['Coq.Init.Logic.True'],
    unresolvedInternal: ['Lib.A.ghost'],
  });
});

test('structural resolution honours section paths', () => {
  const table = new SymbolTable([sym('Lib.A.Sec.inner'), sym('Lib.A.user')]);
  const user = sym('Lib.A.user', {
    references: [{ ...ref('Lib.A', 'inner'), sectionPath: 'Sec' }],
  });
  assert.deepEqual(resolveStructural(user, table, new Set(['Lib.A'])).dependencies, ['Lib.A.Sec.inner']);
});
