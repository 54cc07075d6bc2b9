import { describe, expect, it } from 'vitest';
import { RecencyList } from '../cache/recencyList.js';

describe('RecencyList', () => {
  it('orders keys from most to least recently touched', () => {
    const list = new RecencyList();
    list.touch('a');
    list.touch('b');
    list.touch('c');

    expect(list.keys()).toEqual(['c', 'b', 'a']);
    expect(list.leastRecent()).toBe('a');
  });

  it('moves an existing key to the front without duplicating it', () => {
    const list = new RecencyList();
    list.touch('a');
    list.touch('b');
    list.touch('c');
    list.touch('a');

    expect(list.keys()).toEqual(['a', 'c', 'b']);
    expect(list.size).toBe(3);
  });

  it('touching the head keeps the order', () => {
    const list = new RecencyList();
    list.touch('a');
    list.touch('b');
    list.touch('b');

    expect(list.keys()).toEqual(['b', 'a']);
  });

  it('removes keys from the middle, head and tail', () => {
    const list = new RecencyList();
    for (const key of ['a', 'b', 'c', 'd']) {
      list.touch(key);
    }

    expect(list.remove('b')).toBe(true);
    expect(list.keys()).toEqual(['d', 'c', 'a']);
    expect(list.remove('d')).toBe(true);
    expect(list.keys()).toEqual(['c', 'a']);
    expect(list.remove('a')).toBe(true);
    expect(list.keys()).toEqual(['c']);
    expect(list.leastRecent()).toBe('c');
    expect(list.remove('missing')).toBe(false);
  });

  it('reports the least recent key until the list is empty', () => {
    const list = new RecencyList();
    list.touch('a');
    list.touch('b');

    expect(list.leastRecent()).toBe('a');
    list.remove('a');
    expect(list.leastRecent()).toBe('b');
    list.remove('b');
    expect(list.leastRecent()).toBeUndefined();
    expect(list.size).toBe(0);
    expect(list.keys()).toEqual([]);
  });

  it('can be reused after clear', () => {
    const list = new RecencyList();
    list.touch('a');
    list.touch('b');
    list.clear();

    expect(list.size).toBe(0);
    expect(list.has('a')).toBe(false);
    expect(list.leastRecent()).toBeUndefined();

    list.touch('c');
    expect(list.keys()).toEqual(['c']);
  });
});
