import { describe, it, expect } from 'vitest';
import { maskSecrets } from './config.js';
import { CONFIG_DEFAULTS } from '../config/defaults.js';
import type { ToolboxConfig } from '../config/schema.js';

describe('maskSecrets', () => {
  it('hides the search API key', () => {
    const config: ToolboxConfig = {
      ...CONFIG_DEFAULTS,
      search: { ...CONFIG_DEFAULTS.search, apiKey: 'test-secret', engineId: 'test-cx' },
    };

    const masked = maskSecrets(config);
    expect(masked.search.apiKey).toBe('********');
    expect(masked.search.engineId).toBe('test-cx');
    expect(config.search.apiKey).toBe('test-secret');
  });

  it('returns the config unchanged when no key is set', () => {
    const config: ToolboxConfig = { ...CONFIG_DEFAULTS };
    expect(maskSecrets(config)).toBe(config);
  });
});
