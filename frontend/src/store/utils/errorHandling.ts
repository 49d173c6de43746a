// Error handling utilities for the page controllers
export interface ControllerError {
  id: string;
  scope: string;
  error: Error;
  timestamp: string;
  context?: Record<string, unknown>;
}

export class SiteConfigError extends Error {
  constructor(
    message: string,
    public readonly field: string
  ) {
    super(message);
    this.name = 'SiteConfigError';
  }
}

export class PricingError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PricingError';
  }
}

let errorSequence = 0;

export class ControllerErrorManager {
  private errors: Map<string, ControllerError[]> = new Map();
  private maxErrorsPerScope = 10;

  handleError(scope: string, error: Error, context?: Record<string, unknown>): ControllerError {
    errorSequence += 1;
    const errorId = `error_${Date.now()}_${errorSequence}`;

    const controllerError: ControllerError = {
      id: errorId,
      scope,
      error,
      timestamp: new Date().toISOString(),
      context
    };

    const scopeErrors = this.errors.get(scope) ?? [];
    scopeErrors.push(controllerError);

    // Keep only the most recent errors
    if (scopeErrors.length > this.maxErrorsPerScope) {
      scopeErrors.splice(0, scopeErrors.length - this.maxErrorsPerScope);
    }
    this.errors.set(scope, scopeErrors);

    console.error(`[ControllerErrorManager] Error in ${scope}:`, {
      errorId,
      message: error.message,
      stack: error.stack,
      context
    });

    return controllerError;
  }

  clearErrors(scope?: string) {
    if (scope) {
      this.errors.delete(scope);
    } else {
      this.errors.clear();
    }
  }

  getErrors(scope?: string): ControllerError[] {
    if (scope) {
      return [...(this.errors.get(scope) ?? [])];
    }

    const allErrors: ControllerError[] = [];
    this.errors.forEach(scopeErrors => {
      allErrors.push(...scopeErrors);
    });

    return allErrors.sort(
      (a, b) => new Date(b.timestamp).getTime() - new Date(a.timestamp).getTime()
    );
  }

  getErrorStats() {
    const stats: Record<string, { total: number }> = {};

    this.errors.forEach((scopeErrors, scope) => {
      stats[scope] = { total: scopeErrors.length };
    });

    return stats;
  }
}

const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(String(value));

// Listener boundary: nothing thrown here reaches the page
export const withErrorHandling = <T>(
  scope: string,
  operation: () => T,
  context: Record<string, unknown> | undefined,
  manager: ControllerErrorManager
): T | null => {
  try {
    return operation();
  } catch (error) {
    manager.handleError(scope, toError(error), context);
    return null;
  }
};

export const guardListener = <E extends Event>(
  scope: string,
  listener: (event: E) => void,
  manager: ControllerErrorManager
): ((event: E) => void) => {
  return (event: E) => {
    withErrorHandling(scope, () => listener(event), { eventType: event.type }, manager);
  };
};
