import { describe, expect, it } from 'vitest';
import { createStatus, formatErrorSummary, formatHelpHint, isStatusActive } from '../../src/tui/status.js';

describe('status messages', () => {
  it('is active until its expiry', () => {
    const status = createStatus('Saved', 1000);
    expect(status).toEqual({ text: 'Saved', expiresAt: 4000 });
    expect(isStatusActive(status, 3999)).toBe(true);
    expect(isStatusActive(status, 4000)).toBe(false);
    expect(isStatusActive(null, 0)).toBe(false);
  });

  it('formats the help hint from the configured key', () => {
    expect(formatHelpHint('?')).toBe('Press ? for help');
    expect(formatHelpHint('f1')).toBe('Press f1 for help');
  });

  it('summarizes several errors by the first one', () => {
    expect(formatErrorSummary([])).toBeNull();
    expect(formatErrorSummary([new Error('a')])).toBe('a');
    expect(formatErrorSummary([new Error('a'), new Error('b'), new Error('c')])).toBe('a (+2 more)');
  });
});
