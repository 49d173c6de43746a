import { describe, expect, it } from 'vitest';

import config from '../vite.config';

describe('vite config', () => {
  it('serves the bundle without a proxy or extra response headers', () => {
    expect(config.server?.proxy).toBeUndefined();
    expect(config.server?.headers).toBeUndefined();
    expect(config.server?.port).toBe(Number(process.env.VITE_PORT) || 5173);
  });

  it('writes the build to dist with source maps', () => {
    expect(config.build?.outDir).toBe('../dist');
    expect(config.build?.sourcemap).toBe(true);
  });
});
