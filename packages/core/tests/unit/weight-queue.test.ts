import { describe, it, expect, beforeEach } from 'vitest';
import { MinWeightQueue } from '../../src/weight-queue.js';

describe('MinWeightQueue', () => {
  let queue: MinWeightQueue<string>;

  beforeEach(() => {
    queue = new MinWeightQueue<string>();
  });

  it('should start empty', () => {
    expect(queue.isEmpty()).toBe(true);
    expect(queue.size()).toBe(0);
    expect(queue.peek()).toBeNull();
    expect(queue.extractMin()).toBeNull();
  });

  it('should extract items in ascending weight order', () => {
    queue.insert('heavy', 9);
    queue.insert('light', 1);
    queue.insert('middle', 4);
    queue.insert('lighter', 0);

    expect(queue.peek()).toBe('lighter');
    expect(queue.extractMin()).toBe('lighter');
    expect(queue.extractMin()).toBe('light');
    expect(queue.extractMin()).toBe('middle');
    expect(queue.extractMin()).toBe('heavy');
    expect(queue.isEmpty()).toBe(true);
  });

  it('should extract equal weights in insertion order', () => {
    ['a', 'b', 'c', 'd', 'e', 'f', 'g'].forEach(item => queue.insert(item, 3));

    const drained: string[] = [];
    while (!queue.isEmpty()) {
      const item = queue.extractMin();
      if (item !== null) drained.push(item);
    }

    expect(drained).toEqual(['a', 'b', 'c', 'd', 'e', 'f', 'g']);
  });

  it('should place a reinserted item behind earlier items of the same weight', () => {
    queue.insert('x', 1);
    queue.insert('y', 1);
    queue.insert('z', 2);

    const first = queue.extractMin();
    const second = queue.extractMin();
    queue.insert(`${first}${second}`, 2);

    expect(queue.extractMin()).toBe('z');
    expect(queue.extractMin()).toBe('xy');
  });

  it('should keep FIFO order among ties when weights are interleaved', () => {
    const weights = [5, 2, 5, 1, 2, 5, 1];
    weights.forEach((weight, i) => queue.insert(`item${i}`, weight));

    const drained: string[] = [];
    for (let item = queue.extractMin(); item !== null; item = queue.extractMin()) {
      drained.push(item);
    }

    expect(drained).toEqual([
      'item3',
      'item6',
      'item1',
      'item4',
      'item0',
      'item2',
      'item5',
    ]);
  });
});
