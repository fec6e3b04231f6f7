import assert from 'node:assert';
import test from 'node:test';
import { ConceptRegistry } from './concept-registry';

test('empty registry renders the placeholder line', () => {
  const registry = ConceptRegistry.empty();
  assert.strictEqual(registry.size, 0);
  assert.strictEqual(registry.render(), '- None yet');
});

test('with() returns a new registry and leaves the receiver untouched', () => {
  const first = ConceptRegistry.empty();
  const second = first.with('  Okazaki fragment ligation ');
  assert.notStrictEqual(first, second);
  assert.strictEqual(first.size, 0);
  assert.deepStrictEqual(second.concepts, ['Okazaki fragment ligation']);
  assert.strictEqual(second.render(), '- Okazaki fragment ligation');
});

test('blank tags are ignored', () => {
  const registry = ConceptRegistry.of(['codon degeneracy']);
  assert.strictEqual(registry.with('   '), registry);
});

test('of() copies its input', () => {
  const tags = ['a'];
  const registry = ConceptRegistry.of(tags);
  tags.push('b');
  assert.deepStrictEqual(registry.concepts, ['a']);
});
