import type { SiteConfig } from '../config/site';
import { ControllerErrorManager, guardListener } from '../store/utils/errorHandling';
import { createLogger, type ScopedLogger } from '../lib/log';

/**
 * What every feature binding receives: resolved config, the shared abort signal that tears
 * its listeners down, and the error manager its guarded listeners report into.
 */
export interface ControllerContext {
  config: SiteConfig;
  signal: AbortSignal;
  errors: ControllerErrorManager;
  logger: (scope: string) => ScopedLogger;
}

export function createControllerContext(
  config: SiteConfig,
  signal: AbortSignal,
  errors: ControllerErrorManager
): ControllerContext {
  return {
    config,
    signal,
    errors,
    logger: (scope: string) => createLogger(scope, () => config.debug)
  };
}

interface ListenOptions {
  passive?: boolean;
}

export function onElement<K extends keyof HTMLElementEventMap>(
  ctx: ControllerContext,
  target: HTMLElement,
  type: K,
  scope: string,
  listener: (event: HTMLElementEventMap[K]) => void,
  options: ListenOptions = {}
): void {
  target.addEventListener(type, guardListener(scope, listener, ctx.errors), {
    ...options,
    signal: ctx.signal
  });
}

export function onDocument<K extends keyof DocumentEventMap>(
  ctx: ControllerContext,
  target: Document,
  type: K,
  scope: string,
  listener: (event: DocumentEventMap[K]) => void
): void {
  target.addEventListener(type, guardListener(scope, listener, ctx.errors), {
    signal: ctx.signal
  });
}

export function onWindow<K extends keyof WindowEventMap>(
  ctx: ControllerContext,
  target: Window,
  type: K,
  scope: string,
  listener: (event: WindowEventMap[K]) => void
): void {
  target.addEventListener(type, guardListener(scope, listener, ctx.errors), {
    signal: ctx.signal
  });
}

export function onAbort(ctx: ControllerContext, cleanup: () => void): void {
  if (ctx.signal.aborted) {
    cleanup();
    return;
  }
  ctx.signal.addEventListener('abort', cleanup, { once: true });
}
