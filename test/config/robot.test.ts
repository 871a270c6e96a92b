import {
  defaultRobotSettings,
  readHardwareMockOverride,
  resolveRobotSettings,
  validateMotionParams,
} from '../../src/config/robot';
import { ConfigurationError, InvalidMotionParameterError } from '../../src/core/errors';

describe('readHardwareMockOverride', () => {
  it('reads common truthy spellings', () => {
    for (const value of ['1', 'true', ' TRUE ', 'yes', 'on']) {
      expect(readHardwareMockOverride({ ROBOT_BEHAVIOR_HARDWARE_MOCK: value })).toBe(true);
    }
  });

  it('treats anything else as off', () => {
    expect(readHardwareMockOverride({})).toBe(false);
    expect(readHardwareMockOverride({ ROBOT_BEHAVIOR_HARDWARE_MOCK: '0' })).toBe(false);
    expect(readHardwareMockOverride({ ROBOT_BEHAVIOR_HARDWARE_MOCK: '' })).toBe(false);
  });
});

describe('validateMotionParams', () => {
  it('accepts speed in (0, 1] and positive time', () => {
    expect(validateMotionParams({ speed: 1, time: 0.1 })).toEqual({ speed: 1, time: 0.1 });
    expect(validateMotionParams({})).toEqual({ speed: undefined, time: undefined });
  });

  it('rejects out of range values', () => {
    expect(() => validateMotionParams({ speed: 0 })).toThrow(InvalidMotionParameterError);
    expect(() => validateMotionParams({ speed: Number.NaN })).toThrow(InvalidMotionParameterError);
    expect(() => validateMotionParams({ time: -1 })).toThrow('time must be greater than 0 (got -1)');
  });
});

describe('resolveRobotSettings', () => {
  it('merges overrides onto the defaults', () => {
    const settings = resolveRobotSettings({ host: '10.0.0.5', turnTime: 0.6 });

    expect(settings).toEqual({ ...defaultRobotSettings, host: '10.0.0.5', turnTime: 0.6 });
    expect(defaultRobotSettings.host).toBe('192.168.12.1');
  });

  it('rejects unusable timing', () => {
    expect(() => resolveRobotSettings({ turnSpeed: 1.2 })).toThrow(ConfigurationError);
    expect(() => resolveRobotSettings({ commandRateHz: 0 })).toThrow(
      'Invalid robot settings: commandRateHz and probeTimeoutMs must be positive'
    );
  });
});
