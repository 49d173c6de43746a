import type { SwipeDirection } from '../../types/ui-state';

/**
 * Classify a horizontal touch gesture. The threshold is exclusive: a delta equal to it is not a swipe.
 */
export function classifySwipe(startX: number, endX: number, threshold: number): SwipeDirection | null {
  const delta = endX - startX;
  if (delta > threshold) return 'swiped-right';
  if (-delta > threshold) return 'swiped-left';
  return null;
}

interface PointLike {
  clientX: number;
}

interface PointListLike {
  readonly length: number;
  readonly [index: number]: PointLike | undefined;
}

export function firstClientX(points: PointListLike | null | undefined): number | null {
  if (!points || points.length === 0) return null;
  const point = points[0];
  return point ? point.clientX : null;
}
