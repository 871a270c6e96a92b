import { Event, EventBus, matchPattern } from '../../src/core/event-bus/EventBus';

describe('matchPattern', () => {
  it('matches exact, wildcard, prefix and suffix patterns', () => {
    expect(matchPattern('robot:moved', 'robot:moved')).toBe(true);
    expect(matchPattern('robot:moved', '*')).toBe(true);
    expect(matchPattern('robot:moved', 'robot:*')).toBe(true);
    expect(matchPattern('link:error', '*:error')).toBe(true);
    expect(matchPattern('link:error', 'robot:*')).toBe(false);
    expect(matchPattern('robot:moved', 'robot:blocked')).toBe(false);
  });
});

describe('EventBus', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  it('delivers to matching subscribers synchronously', () => {
    const seen: string[] = [];
    bus.on('robot:*', (e) => {
      seen.push(e.type);
    });

    bus.emit('robot:moved', { x: 1 });
    bus.emit('link:error', {});

    expect(seen).toEqual(['robot:moved']);
  });

  it('passes the payload and source through', () => {
    const events: Event<{ x: number }>[] = [];
    bus.on<{ x: number }>('robot:moved', (e) => {
      events.push(e);
    });

    const id = bus.emit('robot:moved', { x: 3 }, 'program_1');

    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ id, type: 'robot:moved', payload: { x: 3 }, source: 'program_1' });
  });

  it('delivers once-handlers a single time', () => {
    const handler = jest.fn();
    bus.once('robot:reset', handler);

    bus.emit('robot:reset', {});
    bus.emit('robot:reset', {});

    expect(handler).toHaveBeenCalledTimes(1);
    expect(bus.getStats().subscriptions).toBe(0);
  });

  it('stops delivering after unsubscribe', () => {
    const handler = jest.fn();
    const unsubscribe = bus.on('robot:moved', handler);

    unsubscribe();
    bus.emit('robot:moved', {});

    expect(handler).not.toHaveBeenCalled();
  });

  it('moves failing handlers to the dead letter queue', async () => {
    const after = jest.fn();
    bus.on('robot:moved', () => {
      throw new Error('renderer crashed');
    });
    bus.on('robot:blocked', async () => {
      throw new Error('async renderer crashed');
    });
    bus.on('robot:moved', after);

    bus.emit('robot:moved', {});
    bus.emit('robot:blocked', {});
    await new Promise(resolve => setImmediate(resolve));

    expect(after).toHaveBeenCalledTimes(1);
    expect(bus.getDeadLetters().map(l => l.error.message)).toEqual([
      'renderer crashed',
      'async renderer crashed',
    ]);
  });

  it('filters and trims its history', () => {
    const small = new EventBus(4);
    for (let i = 0; i < 5; i++) {
      small.emit(i % 2 === 0 ? 'robot:moved' : 'link:error', { i });
    }

    expect(small.getStats().historySize).toBe(2);
    expect(small.getHistory().map(e => e.payload)).toEqual([{ i: 3 }, { i: 4 }]);
    expect(small.getHistory({ type: 'robot:*' }).map(e => e.payload)).toEqual([{ i: 4 }]);

    small.clearHistory();
    expect(small.getHistory()).toEqual([]);
  });
});
