import { describe, it, expect } from 'vitest';
import { createBindings, describeBindings } from './bindings.js';
import { BindingError, WILDCARD, compileTemplate, type BindingValue } from '../template/index.js';

describe('createBindings', () => {
  const template = compileTemplate('{a}/{b}/{a}.txt');

  it('fills distinct names in order of first appearance', () => {
    expect([...createBindings(template, ['x', 'y'])]).toEqual([
      ['a', 'x'],
      ['b', 'y'],
    ]);
  });

  it('combines positional and named values', () => {
    expect([...createBindings(template, ['x'], { b: 2 })]).toEqual([
      ['a', 'x'],
      ['b', 2],
    ]);
  });

  it('returns an empty set when nothing is supplied', () => {
    expect(createBindings(template).size).toBe(0);
  });

  it('rejects more positional values than placeholders', () => {
    expect(() => createBindings(template, [1, 2, 3])).toThrow(BindingError);
    expect(() => createBindings(template, [1, 2, 3])).toThrow(
      'Got 3 positional values but "{a}/{b}/{a}.txt" has 2 placeholders'
    );
  });

  it('rejects names the template does not declare', () => {
    expect(() => createBindings(template, [], { c: 1 })).toThrow('Unknown placeholder "c" in "{a}/{b}/{a}.txt"');
  });

  it('rejects a name bound twice', () => {
    expect(() => createBindings(template, ['x'], { a: 'y' })).toThrow(
      'Placeholder "a" is bound both by position and by name'
    );
  });
});

describe('describeBindings', () => {
  it('shows wildcards as *', () => {
    const bindings = new Map<string, BindingValue>([
      ['a', WILDCARD],
      ['b', 2],
    ]);
    expect(describeBindings(bindings)).toEqual({ a: '*', b: 2 });
  });
});
