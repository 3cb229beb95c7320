/**
 * Tests for control loop helper functions
 */

import { formatDecision, formatLoopError, formatPowerSource, formatStatusLine } from './helpers';

const POLICY = { startThreshold: 40, stopThreshold: 80 };

describe('Control helpers', () => {
  describe('formatPowerSource', () => {
    it('should describe each power source', () => {
      expect(formatPowerSource(true)).toBe('Plugged in');
      expect(formatPowerSource(false)).toBe('On battery');
      expect(formatPowerSource(null)).toBe('Power source unknown');
    });
  });

  describe('formatStatusLine', () => {
    it('should format percent with one decimal', () => {
      expect(formatStatusLine({ percent: 72, pluggedIn: true }, 'ON')).toBe('Battery: 72.0% | Plugged in | Charger: ON');
    });

    it('should show an unknown charger state', () => {
      expect(formatStatusLine({ percent: 35.46, pluggedIn: false }, 'UNKNOWN')).toBe(
        'Battery: 35.5% | On battery | Charger: UNKNOWN'
      );
    });
  });

  describe('formatDecision', () => {
    it('should explain commands', () => {
      expect(formatDecision({ kind: 'TURN_ON' }, 35, POLICY, 'OFF')).toBe('Battery at 35.0% (<= 40%), turning charger ON');
      expect(formatDecision({ kind: 'TURN_OFF' }, 85, POLICY, 'ON')).toBe('Battery at 85.0% (>= 80%), turning charger OFF');
    });

    it('should explain already-in-state no-ops', () => {
      expect(formatDecision({ kind: 'NO_OP', reason: 'ALREADY_ON' }, 20, POLICY, 'ON')).toBe(
        'Battery at 20.0% (<= 40%), charger already ON'
      );
      expect(formatDecision({ kind: 'NO_OP', reason: 'ALREADY_OFF' }, 90, POLICY, 'OFF')).toBe(
        'Battery at 90.0% (>= 80%), charger already OFF'
      );
    });

    it('should explain the dead band', () => {
      expect(formatDecision({ kind: 'NO_OP', reason: 'HOLD_CURRENT_STATE' }, 60, POLICY, 'ON')).toBe(
        'Battery at 60.0% (between 40% and 80%), charger remains ON'
      );
    });
  });

  describe('formatLoopError', () => {
    it('should include the error name, message and first frame', () => {
      const err = new TypeError('boom');
      err.stack = 'TypeError: boom\n    at readBattery (battery.ts:10:5)\n    at runIteration (control.ts:30:3)';

      expect(formatLoopError(err)).toBe('Error in monitoring loop: TypeError: boom (at readBattery (battery.ts:10:5))');
    });

    it('should omit the frame when there is no stack', () => {
      const err = new Error('boom');
      err.stack = undefined;

      expect(formatLoopError(err)).toBe('Error in monitoring loop: Error: boom');
    });

    it('should stringify non-errors', () => {
      expect(formatLoopError('bad thing')).toBe('Error in monitoring loop: bad thing');
    });
  });
});
