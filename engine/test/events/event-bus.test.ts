import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { EngineLogger } from '../../src/core/EngineLogger.js';
import { createEvent, EngineEventType, isEventOfType, type EngineEvent } from '../../src/events/EngineEvents.js';
import { EventBus } from '../../src/events/EventBus.js';
import { RunStatus } from '../../src/types/core-types.js';

const started = (): EngineEvent<EngineEventType.RUN_STARTED> =>
  createEvent(EngineEventType.RUN_STARTED, 'run-1', { workflowName: 'pipeline', nodeCount: 3, concurrency: 2 });

const completed = (): EngineEvent<EngineEventType.RUN_COMPLETED> =>
  createEvent(EngineEventType.RUN_COMPLETED, 'run-1', { status: RunStatus.SUCCEEDED, durationMs: 5 });

function capturingLogger(lines: string[]): EngineLogger {
  return new EngineLogger({ level: 'debug' }, pino({ level: 'debug' }, { write: (line: string) => lines.push(line) }));
}

describe('EventBus', () => {
  it('should deliver events only to handlers of their type', () => {
    const bus = new EventBus();
    const onStarted = vi.fn();
    const onCompleted = vi.fn();
    bus.on(EngineEventType.RUN_STARTED, onStarted);
    bus.on(EngineEventType.RUN_COMPLETED, onCompleted);

    const event = started();
    bus.emit(event);

    expect(onStarted).toHaveBeenCalledWith(event);
    expect(onCompleted).not.toHaveBeenCalled();
  });

  it('should stop delivering after unsubscribe', () => {
    const bus = new EventBus();
    const handler = vi.fn();
    const unsubscribe = bus.on(EngineEventType.RUN_STARTED, handler);

    bus.emit(started());
    unsubscribe();
    bus.emit(started());

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('should call typed handlers before wildcard handlers', () => {
    const bus = new EventBus();
    const order: string[] = [];
    bus.onAny(event => {
      order.push(`any:${event.type}`);
    });
    bus.on(EngineEventType.RUN_STARTED, () => {
      order.push('typed');
    });

    bus.emit(started());
    bus.emit(completed());

    expect(order).toEqual(['typed', 'any:run.started', 'any:run.completed']);
  });

  it('should fire once handlers a single time', () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.once(EngineEventType.RUN_STARTED, handler);

    bus.emit(started());
    bus.emit(started());

    expect(handler).toHaveBeenCalledTimes(1);
    expect(bus.listenerCount(EngineEventType.RUN_STARTED)).toBe(0);
  });

  it('should keep delivering when a handler throws', () => {
    const lines: string[] = [];
    const bus = new EventBus(capturingLogger(lines));
    const after = vi.fn();
    bus.on(EngineEventType.RUN_STARTED, () => {
      throw new Error('handler broke');
    });
    bus.on(EngineEventType.RUN_STARTED, after);

    bus.emit(started());

    expect(after).toHaveBeenCalledTimes(1);
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      msg: 'Event handler failed for "run.started"',
      eventType: 'run.started',
      err: { message: 'handler broke' },
    });
  });

  it('should report rejected async handlers', async () => {
    const lines: string[] = [];
    const bus = new EventBus(capturingLogger(lines));
    bus.on(EngineEventType.RUN_STARTED, async () => {
      throw new Error('async failure');
    });

    bus.emit(started());
    await new Promise(resolve => setImmediate(resolve));

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({ err: { message: 'async failure' } });
  });

  it('should remove handlers by type or all at once', () => {
    const bus = new EventBus();
    bus.on(EngineEventType.RUN_STARTED, vi.fn());
    bus.on(EngineEventType.RUN_COMPLETED, vi.fn());
    bus.onAny(vi.fn());

    expect(bus.listenerCount(EngineEventType.RUN_STARTED)).toBe(2);
    bus.off(EngineEventType.RUN_STARTED);
    expect(bus.listenerCount(EngineEventType.RUN_STARTED)).toBe(1);
    bus.off();
    expect(bus.listenerCount(EngineEventType.RUN_COMPLETED)).toBe(0);
  });
});

describe('isEventOfType', () => {
  it('should narrow by event type', () => {
    const event: EngineEvent = started();

    expect(isEventOfType(event, EngineEventType.RUN_STARTED)).toBe(true);
    expect(isEventOfType(event, EngineEventType.RUN_COMPLETED)).toBe(false);
  });
});
