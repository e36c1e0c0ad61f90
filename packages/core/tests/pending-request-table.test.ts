import { describe, it, expect } from 'vitest';
import { PendingRequestTable } from '../src/pending-request-table.js';

describe('PendingRequestTable', () => {
  it('issues increasing ids starting at 1', () => {
    const table = new PendingRequestTable<string>();
    expect(table.add('a')).toBe(1);
    expect(table.add('b')).toBe(2);
    expect(table.add('c')).toBe(3);
  });

  it('lookup returns the stored record', () => {
    const table = new PendingRequestTable<string>();
    const id = table.add('a');
    expect(table.lookup(id)).toBe('a');
    expect(table.has(id)).toBe(true);
  });

  it('lookup returns undefined for unknown and removed ids', () => {
    const table = new PendingRequestTable<string>();
    const id = table.add('a');
    expect(table.lookup(999)).toBeUndefined();

    expect(table.remove(id)).toBe(true);
    expect(table.lookup(id)).toBeUndefined();
    expect(table.remove(id)).toBe(false);
  });

  it('does not reuse ids after removal', () => {
    const table = new PendingRequestTable<string>();
    const first = table.add('a');
    table.remove(first);
    expect(table.add('b')).toBe(first + 1);
  });

  it('tracks size and emptiness', () => {
    const table = new PendingRequestTable<string>();
    expect(table.isEmpty()).toBe(true);
    table.add('a');
    table.add('b');
    expect(table.size).toBe(2);
    expect(table.isEmpty()).toBe(false);
    table.clear();
    expect(table.size).toBe(0);
    expect(table.isEmpty()).toBe(true);
  });

  it('iterates entries in insertion order', () => {
    const table = new PendingRequestTable<string>();
    table.add('a');
    table.add('b');
    expect([...table]).toEqual([
      [1, 'a'],
      [2, 'b'],
    ]);
  });

  it('drain returns a snapshot and empties the table', () => {
    const table = new PendingRequestTable<string>();
    table.add('a');
    table.add('b');

    const drained = table.drain();

    expect(drained).toEqual([
      [1, 'a'],
      [2, 'b'],
    ]);
    expect(table.isEmpty()).toBe(true);
  });

  it('wraps back to 1 after MAX_SAFE_INTEGER', () => {
    const table = new PendingRequestTable<string>(Number.MAX_SAFE_INTEGER - 1);

    expect(table.add('a')).toBe(Number.MAX_SAFE_INTEGER - 1);
    expect(table.add('b')).toBe(Number.MAX_SAFE_INTEGER);
    expect(table.add('c')).toBe(1);
    expect(table.add('d')).toBe(2);
    expect(table.lookup(Number.MAX_SAFE_INTEGER)).toBe('b');
  });
});
