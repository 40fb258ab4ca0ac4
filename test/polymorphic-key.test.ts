import assert from 'node:assert/strict';
import test from 'node:test';

import { TypeConversionError } from '../src/lib/errors.js';
import type { KeyTypeRegistry } from '../src/lib/polymorphic-key.js';
import { Key } from '../src/lib/polymorphic-key.js';

test('Key.parse picks the narrowest integer width first', () => {
  assert.deepStrictEqual(Key.parse('42').variant, { kind: 'i8', value: 42 });
  assert.deepStrictEqual(Key.parse('-5').variant, { kind: 'i8', value: -5 });
  assert.deepStrictEqual(Key.parse('300').variant, { kind: 'i16', value: 300 });
  assert.deepStrictEqual(Key.parse('70000').variant, { kind: 'i32', value: 70000 });
  assert.deepStrictEqual(Key.parse('5000000000').variant, { kind: 'i64', value: 5000000000n });
});

test('Key.parse keeps integers beyond i64 as u64 and beyond u64 as strings', () => {
  assert.deepStrictEqual(Key.parse('18446744073709551615').variant, {
    kind: 'u64',
    value: 18446744073709551615n,
  });
  assert.deepStrictEqual(Key.parse('18446744073709551616').variant, {
    kind: 'string',
    value: '18446744073709551616',
  });
});

test('Key.parse prefers f32 only when the value survives single precision', () => {
  assert.deepStrictEqual(Key.parse('0.5').variant, { kind: 'f32', value: 0.5 });
  assert.deepStrictEqual(Key.parse('0.1').variant, { kind: 'f64', value: 0.1 });
});

test('Key.parse falls through bool, UUID and string', () => {
  assert.deepStrictEqual(Key.parse('true').variant, { kind: 'bool', value: true });
  assert.deepStrictEqual(Key.parse('550E8400-E29B-41D4-A716-446655440000').variant, {
    kind: 'uuid',
    value: '550e8400-e29b-41d4-a716-446655440000',
  });
  assert.deepStrictEqual(Key.parse('hello').variant, { kind: 'string', value: 'hello' });
});

test('wrapped text keeps its kind and reads back to an equal key', () => {
  const key = Key.from(42);
  assert.strictEqual(key.kind, 'i32');
  assert.strictEqual(key.toWrappedString(), 'I32(42)');
  assert.ok(Key.parse(key.toWrappedString()).equals(key));

  assert.deepStrictEqual(Key.parse('I64(42)').variant, { kind: 'i64', value: 42n });
  // A plain parse of the same text lands on a narrower width
  assert.ok(!Key.parse('42').equals(key));
});

test('wrapped text whose value does not fit the kind is a plain string', () => {
  assert.deepStrictEqual(Key.parse('U8(300)').variant, { kind: 'string', value: 'U8(300)' });
});

test('Key.from infers kinds from JavaScript values', () => {
  assert.strictEqual(Key.from(2147483648).kind, 'i64');
  assert.strictEqual(Key.from(1.25).kind, 'f64');
  assert.strictEqual(Key.from(9n).kind, 'i64');
  assert.strictEqual(Key.from(true).kind, 'bool');
  assert.strictEqual(Key.from('abc').kind, 'string');
  assert.strictEqual(Key.from(new Date(0)).kind, 'datetime');
});

test('f32 keys print their shortest exact text', () => {
  const key = Key.of('f32', 0.1);
  assert.strictEqual(key.value, Math.fround(0.1));
  assert.strictEqual(key.toString(), '0.1');
  assert.strictEqual(key.toWrappedString(), 'F32(0.1)');
});

test('json keys compare by content, not by property order', () => {
  const left = Key.of('json', { b: 1, a: [true, null] });
  const right = Key.of('json', { a: [true, null], b: 1 });
  assert.ok(left.equals(right));
  assert.strictEqual(left.hash(), 'json:{"a":[true,null],"b":1}');
  assert.strictEqual(left.toBackendValue(), '{"b":1,"a":[true,null]}');
});

test('datetime keys print RFC 3339 and copy their date', () => {
  const when = new Date('2024-03-01T12:00:00.000Z');
  const key = Key.from(when);
  assert.strictEqual(key.toString(), '2024-03-01T12:00:00.000Z');

  const backend = key.toBackendValue();
  assert.ok(backend instanceof Date);
  assert.notStrictEqual(backend, when);
  assert.strictEqual(backend.getTime(), when.getTime());
});

test('Key.of rejects integers outside the declared width', () => {
  assert.throws(() => Key.of('u8', 256), TypeConversionError);
  assert.throws(() => Key.of('uuid', 'not-a-uuid'), TypeConversionError);
});

test('convertTo moves a key into another column type', () => {
  assert.strictEqual(Key.parse('42').convertTo('i64'), 42n);
  assert.strictEqual(Key.from('17').convertTo('i32'), 17);
  assert.strictEqual(Key.from(7).convertTo('string'), '7');
  assert.strictEqual(Key.from('true').convertTo('bool'), true);
  assert.strictEqual(Key.from(3n).convertTo('json'), '"3"');
  assert.throws(() => Key.from('abc').convertTo('i32'), TypeConversionError);
  assert.throws(() => Key.from(70000).convertTo('i16'), TypeConversionError);
});

test('fromBackendValue and toBackendValue are inverse for every kind', () => {
  const keys = [
    Key.of('i16', 12),
    Key.of('u64', 18446744073709551615n),
    Key.of('f64', 2.5),
    Key.of('uuid', '550e8400-e29b-41d4-a716-446655440000'),
    Key.of('bool', false),
    Key.of('date', '2024-03-01'),
    Key.of('datetime', new Date('2024-03-01T00:00:00.000Z')),
    Key.of('json', { nested: ['x'] }),
  ];
  for (const key of keys) {
    assert.ok(Key.fromBackendValue(key.toBackendValue(), key.kind).equals(key), key.toWrappedString());
  }
});

test('fromDbValue recognizes UUID-shaped text', () => {
  assert.strictEqual(Key.fromDbValue('550E8400-E29B-41D4-A716-446655440000').kind, 'uuid');
  assert.strictEqual(Key.fromDbValue('plain').kind, 'string');
  assert.strictEqual(Key.fromDbValue(12).kind, 'i32');
  assert.strictEqual(Key.fromDbValue({ a: 1 }).kind, 'json');
});

test('toValueForEntity converts through the registry and falls back when it is unknown', () => {
  const registry: KeyTypeRegistry = {
    primaryKeyType: entity => (entity === 'Post' ? 'i64' : null),
    fieldType: (entity, field) => (entity === 'Post' && field === 'slug' ? 'string' : null),
  };
  const key = Key.from(12);

  assert.strictEqual(key.toValueForEntity(registry, 'Post'), 12n);
  assert.strictEqual(key.toValueForEntity(registry, 'Unknown'), 12);
  assert.strictEqual(key.toValueForField(registry, 'Post', 'slug'), '12');
});
