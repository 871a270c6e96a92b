import { EventBus } from '../../src/core/event-bus/EventBus';
import { createLogger } from '../../src/core/Logger';

describe('createLogger', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('emits log entries as events and drops debug lines by default', () => {
    const logger = createLogger('program_1', { bus });

    logger.debug('hidden');
    logger.info('Moved right');
    logger.warn('Move up blocked');

    const entries = bus.getHistory({ type: 'robot:log' }).map(e => e.payload);
    expect(entries).toEqual([
      expect.objectContaining({ source: 'program_1', level: 'info', message: 'Moved right' }),
      expect.objectContaining({ source: 'program_1', level: 'warn', message: 'Move up blocked' }),
    ]);
  });

  it('prefixes child sources', () => {
    const child = createLogger('program_1', { bus }).child('sim');

    child.error('boom');

    expect(child.source).toBe('program_1:sim');
    expect(bus.getHistory()[0].source).toBe('program_1:sim');
  });

  it('writes to the console only in debug mode', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    createLogger('quiet', { bus }).info('not printed');
    createLogger('loud', { bus, debug: true }).debug('printed');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('[loud] DEBUG: printed');
  });
});
