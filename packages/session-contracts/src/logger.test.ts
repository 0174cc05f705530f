import { describe, it, expect } from 'vitest';
import { SEVERITY_NAMES, isSeverity, severityRank } from './logger.js';

describe('severities', () => {
  it('should be ordered from least to most severe', () => {
    expect(SEVERITY_NAMES).toEqual([
      'debugApi',
      'debug',
      'info',
      'progress',
      'warning',
      'error',
      'critical',
    ]);
    expect(severityRank('debugApi')).toBe(0);
    expect(severityRank('warning')).toBeGreaterThan(severityRank('progress'));
  });

  it('should recognise severity names', () => {
    expect(isSeverity('critical')).toBe(true);
    expect(isSeverity('warn')).toBe(false);
    expect(isSeverity(3)).toBe(false);
  });
});
