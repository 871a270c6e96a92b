import { defaultRobotSettings } from '../../src/config/robot';
import { describeCommand, planCommands, stickFor } from '../../src/actuators/commands';

describe('planCommands', () => {
  it('walks forward toward the facing', () => {
    expect(planCommands('right', 'east', defaultRobotSettings)).toEqual({
      commands: [{ kind: 'forward', speed: 0.3, time: 1 }],
      facing: 'east',
    });
  });

  it('walks backward away from the facing without turning around', () => {
    expect(planCommands('left', 'east', defaultRobotSettings)).toEqual({
      commands: [{ kind: 'backward', speed: 0.3, time: 1 }],
      facing: 'east',
    });
    expect(planCommands('backward', 'north', defaultRobotSettings)).toEqual({
      commands: [{ kind: 'backward', speed: 0.3, time: 1 }],
      facing: 'north',
    });
  });

  it('turns a quarter toward a sideways target, then walks', () => {
    expect(planCommands('up', 'east', defaultRobotSettings)).toEqual({
      commands: [
        { kind: 'turn_left', speed: 0.3, time: 1 },
        { kind: 'forward', speed: 0.3, time: 1 },
      ],
      facing: 'north',
    });
    expect(planCommands('down', 'east', defaultRobotSettings).commands[0].kind).toBe('turn_right');
    expect(planCommands('left', 'north', defaultRobotSettings).commands[0].kind).toBe('turn_left');
  });

  it('applies speed and time to the walk but not to the turn', () => {
    const timing = { ...defaultRobotSettings, turnSpeed: 0.4, turnTime: 0.5 };

    expect(planCommands('up', 'east', timing, { speed: 0.5, time: 0.8 }).commands).toEqual([
      { kind: 'turn_left', speed: 0.4, time: 0.5 },
      { kind: 'forward', speed: 0.5, time: 0.8 },
    ]);
  });
});

describe('stickFor', () => {
  it('drives forward on the last axis and turns on the second', () => {
    expect(stickFor({ kind: 'forward', speed: 0.3, time: 1 })).toEqual([0, 0, 0, 0.3]);
    expect(stickFor({ kind: 'backward', speed: 0.3, time: 1 })).toEqual([0, 0, 0, -0.3]);
    expect(stickFor({ kind: 'turn_right', speed: 0.5, time: 1 })).toEqual([0, 0.5, 0, 0]);
    expect(stickFor({ kind: 'turn_left', speed: 0.5, time: 1 })).toEqual([0, -0.5, 0, 0]);
  });
});

it('describes a command', () => {
  expect(describeCommand({ kind: 'forward', speed: 0.3, time: 1 })).toBe('forward(speed=0.3, time=1)');
});
