import { describe, expect, it, vi } from 'vitest';
import { EventBus } from '../../../src/engine/event-bus.js';
import type { EngineEvent } from '../../../src/types/events.js';

describe('EventBus', () => {
  it('stamps events that carry no timestamp', () => {
    const bus = new EventBus();
    const seen: EngineEvent[] = [];
    bus.on('event', (e) => seen.push(e));
    bus.emitEvent({ type: 'iteration.started', sessionId: 's1', iteration: 1, maxIterations: 5, timestamp: '' });
    expect(seen).toHaveLength(1);
    expect(Number.isNaN(Date.parse(seen[0]?.timestamp ?? ''))).toBe(false);
  });

  it('keeps a timestamp that is already set', () => {
    const bus = new EventBus();
    const handler = vi.fn();
    bus.on('event', handler);
    const event: EngineEvent = {
      type: 'session.failed',
      sessionId: 's1',
      error: 'boom',
      iteration: 2,
      timestamp: '2026-01-01T00:00:00.000Z',
    };
    bus.emitEvent(event);
    expect(handler).toHaveBeenCalledWith(event);
  });
});
