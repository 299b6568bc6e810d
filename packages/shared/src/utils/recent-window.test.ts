import { describe, it, expect } from 'vitest';
import { createRecentWindow } from './recent-window.js';

describe('RecentWindow', () => {
  it('should start empty', () => {
    const window = createRecentWindow(3);
    expect(window.size).toBe(0);
    expect(window.toArray()).toEqual([]);
  });

  it('should list samples most recent first', () => {
    const window = createRecentWindow(3);
    window.push(1);
    window.push(2);
    expect(window.toArray()).toEqual([2, 1]);
    expect(window.size).toBe(2);
  });

  it('should evict the oldest sample once capacity is exceeded', () => {
    const window = createRecentWindow(3);
    for (const v of [1, 2, 3, 4, 5]) {
      window.push(v);
    }
    expect(window.toArray()).toEqual([5, 4, 3]);
    expect(window.size).toBe(3);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => createRecentWindow(0)).toThrow(RangeError);
  });

  it('should clone into an independent window', () => {
    const window = createRecentWindow(3);
    for (const v of [1, 2, 3, 4]) {
      window.push(v);
    }
    const copy = window.clone();
    copy.push(5);
    window.push(6);

    expect(copy.toArray()).toEqual([5, 4, 3]);
    expect(window.toArray()).toEqual([6, 4, 3]);
    expect(copy.capacity).toBe(3);
  });
});
