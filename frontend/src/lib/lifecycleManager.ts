import { createLogger } from './log';

type CleanupHook = () => void;

const log = createLogger('PageLifecycle', () => false);

export class PageLifecycleManager {
  private hooks: CleanupHook[] = [];
  private isShuttingDown = false;
  private detach: (() => void) | null = null;

  registerCleanup(cleanup: CleanupHook): () => void {
    this.hooks.push(cleanup);
    return () => {
      this.hooks = this.hooks.filter(hook => hook !== cleanup);
    };
  }

  // Runs every hook once; a failing hook does not stop the rest
  shutdown(): void {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;
    const hooks = this.hooks;
    this.hooks = [];
    for (const hook of hooks) {
      try {
        hook();
      } catch (err) {
        log.error('Cleanup hook failed', { error: err instanceof Error ? err.message : String(err) });
      }
    }
    this.isShuttingDown = false;
  }

  attach(target: Window): void {
    if (this.detach) return;
    const onPageHide = (event: PageTransitionEvent) => {
      // Pages kept in the back/forward cache keep their listeners
      if (!event.persisted) this.shutdown();
    };
    target.addEventListener('pagehide', onPageHide);
    this.detach = () => target.removeEventListener('pagehide', onPageHide);
  }

  release(): void {
    this.detach?.();
    this.detach = null;
  }

  get pendingHooks(): number {
    return this.hooks.length;
  }
}

export const pageLifecycleManager = new PageLifecycleManager();
