import { describe, it, expect } from 'vitest';
import { createSeedSequence, loadConfig } from './config';

describe('loadConfig', () => {
  it('should read the seed from the environment', () => {
    expect(loadConfig({ DENSEMAT_SEED: ' test-seed ' })).toEqual({ seed: 'test-seed' });
  });

  it('should ignore a missing or blank seed', () => {
    expect(loadConfig({})).toEqual({});
    expect(loadConfig({ DENSEMAT_SEED: '  ' })).toEqual({});
  });
});

describe('createSeedSequence', () => {
  it('should derive a distinct seed per call', () => {
    const next = createSeedSequence('base');
    expect([next(), next(), next()]).toEqual(['base-0', 'base-1', 'base-2']);
  });

  it('should yield undefined without a base seed', () => {
    expect(createSeedSequence()()).toBeUndefined();
  });
});
