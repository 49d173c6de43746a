import { describe, expect, it } from 'vitest';

import { classifySwipe, firstClientX } from '../src/lib/gestures/swipe';

describe('classifySwipe', () => {
  it('classifies a rightward delta beyond the threshold as swiped-right', () => {
    expect(classifySwipe(100, 181, 80)).toBe('swiped-right');
  });

  it('classifies a leftward delta beyond the threshold as swiped-left', () => {
    expect(classifySwipe(200, 119, 80)).toBe('swiped-left');
  });

  it('treats deltas within the threshold as no swipe', () => {
    expect(classifySwipe(100, 180, 80)).toBeNull();
    expect(classifySwipe(100, 20, 80)).toBeNull();
    expect(classifySwipe(100, 100, 80)).toBeNull();
  });
});

describe('firstClientX', () => {
  it('reads the first point of a list', () => {
    expect(firstClientX([{ clientX: 42 }, { clientX: 7 }])).toBe(42);
  });

  it('returns null for empty or missing lists', () => {
    expect(firstClientX([])).toBeNull();
    expect(firstClientX(undefined)).toBeNull();
  });
});
