import { describe, it, expect } from 'vitest';
import { generateRequestId } from '../ids.js';

describe('generateRequestId', () => {
  it('starts with the given prefix', () => {
    expect(generateRequestId('req').startsWith('req-')).toBe(true);
  });

  it('embeds the current time', () => {
    const before = Date.now();
    const id = generateRequestId('req');
    const after = Date.now();

    const timestamp = parseInt(id.split('-')[1], 10);
    expect(timestamp).toBeGreaterThanOrEqual(before);
    expect(timestamp).toBeLessThanOrEqual(after);
  });

  it('ends with a random suffix', () => {
    const parts = generateRequestId('req').split('-');
    expect(parts.length).toBe(3);
    expect(parts[2]).toMatch(/^[0-9a-z]+$/);
  });

  it('does not repeat', () => {
    const ids = new Set<string>();
    for (let i = 0; i < 100; i++) {
      ids.add(generateRequestId('req'));
    }
    expect(ids.size).toBe(100);
  });
});
