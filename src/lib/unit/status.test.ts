import { describe, expect, test } from 'vitest';
import {
  activeStatus,
  blockedStatus,
  compareSeverity,
  formatStatus,
  isUnitSeverity,
  maintenanceStatus,
  mostSevere,
  waitingStatus,
} from './status';

describe('status helpers', () => {
  test('should order severities active < waiting < maintenance < blocked', () => {
    expect(compareSeverity('active', 'waiting')).toBeLessThan(0);
    expect(compareSeverity('waiting', 'maintenance')).toBeLessThan(0);
    expect(compareSeverity('maintenance', 'blocked')).toBeLessThan(0);
    expect(compareSeverity('blocked', 'blocked')).toBe(0);
    expect(compareSeverity('blocked', 'active')).toBeGreaterThan(0);
  });

  test('should pick the most severe status, first one on a tie', () => {
    const first = maintenanceStatus('first');
    const second = maintenanceStatus('second');

    expect(mostSevere([activeStatus(), first, waitingStatus('w'), second])).toBe(first);
    expect(mostSevere([first, blockedStatus('b')])).toEqual({
      severity: 'blocked',
      message: 'b',
    });
    expect(mostSevere([])).toBeNull();
  });

  test('should recognise severities', () => {
    expect(isUnitSeverity('maintenance')).toBe(true);
    expect(isUnitSeverity('error')).toBe(false);
    expect(isUnitSeverity(undefined)).toBe(false);
  });

  test('should format a status for display', () => {
    expect(formatStatus(blockedStatus('Missing relations: shared-db'))).toBe(
      'blocked: Missing relations: shared-db',
    );
    expect(formatStatus(activeStatus())).toBe('active');
  });
});
