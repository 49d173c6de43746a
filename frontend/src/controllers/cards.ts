import type { SiteConfig } from '../config/site';
import type { SwipeDirection } from '../types/ui-state';
import { classifySwipe, firstClientX } from '../lib/gestures/swipe';
import { onAbort, onElement, type ControllerContext } from './context';

const SCOPE = 'CardGestures';

type Timer = ReturnType<typeof setTimeout>;

/**
 * Hover reveal and swipe feedback for interactive cards. Each card holds at most one
 * pending reset; a new gesture cancels it so repeated swipes do not flicker.
 */
export class CardGestureTracker {
  private startX = new Map<HTMLElement, number>();
  private pendingReset = new Map<HTMLElement, Timer>();

  constructor(private readonly config: Pick<SiteConfig, 'classes' | 'swipeThreshold' | 'swipeResetMs'>) {}

  reveal(card: HTMLElement, revealed: boolean): void {
    card.classList.toggle(this.config.classes.cardRevealed, revealed);
  }

  touchStart(card: HTMLElement, clientX: number): void {
    this.startX.set(card, clientX);
  }

  touchEnd(card: HTMLElement, clientX: number): SwipeDirection | null {
    const startX = this.startX.get(card);
    if (startX === undefined) return null;
    this.startX.delete(card);

    this.cancelReset(card);
    this.clearSwipe(card);

    const direction = classifySwipe(startX, clientX, this.config.swipeThreshold);
    if (direction) {
      card.classList.add(this.classFor(direction));
    }

    this.pendingReset.set(
      card,
      setTimeout(() => {
        this.pendingReset.delete(card);
        this.clearSwipe(card);
      }, this.config.swipeResetMs)
    );
    return direction;
  }

  hasPendingReset(card: HTMLElement): boolean {
    return this.pendingReset.has(card);
  }

  dispose(): void {
    this.pendingReset.forEach(timer => clearTimeout(timer));
    this.pendingReset.clear();
    this.startX.clear();
  }

  private cancelReset(card: HTMLElement): void {
    const timer = this.pendingReset.get(card);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.pendingReset.delete(card);
    }
  }

  private clearSwipe(card: HTMLElement): void {
    card.classList.remove(this.config.classes.swipedLeft, this.config.classes.swipedRight);
  }

  private classFor(direction: SwipeDirection): string {
    return direction === 'swiped-left' ? this.config.classes.swipedLeft : this.config.classes.swipedRight;
  }
}

export function bindCards(ctx: ControllerContext, cards: HTMLElement[]): CardGestureTracker {
  const tracker = new CardGestureTracker(ctx.config);
  const log = ctx.logger(SCOPE);
  onAbort(ctx, () => tracker.dispose());

  for (const card of cards) {
    onElement(ctx, card, 'mouseenter', SCOPE, () => tracker.reveal(card, true));
    onElement(ctx, card, 'mouseleave', SCOPE, () => tracker.reveal(card, false));

    onElement(
      ctx,
      card,
      'touchstart',
      SCOPE,
      event => {
        const x = firstClientX(event.touches);
        if (x !== null) tracker.touchStart(card, x);
      },
      { passive: true }
    );

    onElement(ctx, card, 'touchend', SCOPE, event => {
      const x = firstClientX(event.changedTouches);
      if (x === null) return;
      const direction = tracker.touchEnd(card, x);
      if (direction) log.debug('Card swiped', { direction });
    });
  }

  return tracker;
}
