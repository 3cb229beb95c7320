import { plugIsOn, resolveUnverified, toPlugState } from './helpers';

describe('plug helpers', () => {
  describe('toPlugState / plugIsOn', () => {
    it('should map power flags to states and back', () => {
      expect(toPlugState(true)).toBe('ON');
      expect(toPlugState(false)).toBe('OFF');
      expect(toPlugState(null)).toBe('UNKNOWN');
      expect(plugIsOn('ON')).toBe(true);
      expect(plugIsOn('OFF')).toBe(false);
      expect(plugIsOn('UNKNOWN')).toBeNull();
    });
  });

  describe('resolveUnverified', () => {
    it('should assume success at INFO', () => {
      expect(resolveUnverified('assume-success', 'ON')).toEqual({
        success: true,
        level: 1,
        message: 'Command sent but charger state could not be verified, assuming ON'
      });
    });

    it('should succeed with a WARNING under warn', () => {
      expect(resolveUnverified('warn', 'OFF')).toEqual({
        success: true,
        level: 2,
        message: 'Command sent but charger state could not be verified, check that the device is OFF'
      });
    });

    it('should fail with a WARNING under fail', () => {
      expect(resolveUnverified('fail', 'ON')).toEqual({
        success: false,
        level: 2,
        message: 'Command sent but charger state could not be verified, treating turn ON as failed'
      });
    });
  });
});
