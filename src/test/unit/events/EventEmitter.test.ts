/**
 * Unit tests for EventEmitter
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from '../../../lib/events/EventEmitter';

interface TestEvents {
  zoom: { zoom: number };
  copy: { text: string };
  reset: undefined;
}

describe('EventEmitter', () => {
  let emitter: EventEmitter<TestEvents>;

  beforeEach(() => {
    emitter = new EventEmitter<TestEvents>();
  });

  describe('on()', () => {
    it('should register handlers per event', () => {
      emitter.on('zoom', vi.fn());
      emitter.on('zoom', vi.fn());
      emitter.on('copy', vi.fn());

      expect(emitter.listenerCount('zoom')).toBe(2);
      expect(emitter.listenerCount('copy')).toBe(1);
    });

    it('should not duplicate the same handler', () => {
      const handler = vi.fn();
      emitter.on('zoom', handler);
      emitter.on('zoom', handler);

      expect(emitter.listenerCount('zoom')).toBe(1);
    });
  });

  describe('off()', () => {
    it('should remove only the given handler', () => {
      const first = vi.fn();
      const second = vi.fn();
      emitter.on('zoom', first);
      emitter.on('zoom', second);
      emitter.off('zoom', first);

      emitter.emit('zoom', { zoom: 2 });

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledWith({ zoom: 2 });
    });

    it('should ignore unknown handlers and events', () => {
      expect(() => emitter.off('copy', vi.fn())).not.toThrow();
      expect(emitter.listenerCount('copy')).toBe(0);
    });
  });

  describe('emit()', () => {
    it('should pass the payload to every handler in registration order', () => {
      const calls: string[] = [];
      emitter.on('copy', e => calls.push(`a:${e.text}`));
      emitter.on('copy', e => calls.push(`b:${e.text}`));

      emitter.emit('copy', { text: 'Total' });

      expect(calls).toEqual(['a:Total', 'b:Total']);
    });

    it('should accept events without a payload', () => {
      const handler = vi.fn();
      emitter.on('reset', handler);
      emitter.emit('reset', undefined);

      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should not throw without handlers', () => {
      expect(() => emitter.emit('zoom', { zoom: 1 })).not.toThrow();
    });

    it('should report a throwing handler and keep going', () => {
      const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      const error = new Error('Handler error');
      const after = vi.fn();
      emitter.on('zoom', () => {
        throw error;
      });
      emitter.on('zoom', after);

      emitter.emit('zoom', { zoom: 2 });

      expect(after).toHaveBeenCalled();
      expect(consoleSpy).toHaveBeenCalledWith('[EventEmitter] Error in handler for "zoom":', error);
      consoleSpy.mockRestore();
    });

    it('should let a handler unsubscribe while emitting', () => {
      const second = vi.fn();
      const first = vi.fn(() => emitter.off('zoom', second));
      emitter.on('zoom', first);
      emitter.on('zoom', second);

      emitter.emit('zoom', { zoom: 1 });
      emitter.emit('zoom', { zoom: 1 });

      expect(first).toHaveBeenCalledTimes(2);
      expect(second).toHaveBeenCalledTimes(1);
    });
  });

  describe('once()', () => {
    it('should call the handler for the first emit only', () => {
      const handler = vi.fn();
      emitter.once('copy', handler);

      emitter.emit('copy', { text: 'a' });
      emitter.emit('copy', { text: 'b' });

      expect(handler).toHaveBeenCalledTimes(1);
      expect(handler).toHaveBeenCalledWith({ text: 'a' });
      expect(emitter.listenerCount('copy')).toBe(0);
    });

    it('should work alongside regular handlers', () => {
      const onceHandler = vi.fn();
      const regularHandler = vi.fn();
      emitter.once('zoom', onceHandler);
      emitter.on('zoom', regularHandler);

      emitter.emit('zoom', { zoom: 1 });
      emitter.emit('zoom', { zoom: 2 });

      expect(onceHandler).toHaveBeenCalledTimes(1);
      expect(regularHandler).toHaveBeenCalledTimes(2);
    });
  });

  describe('removeAllListeners()', () => {
    it('should clear one event', () => {
      emitter.on('zoom', vi.fn());
      emitter.on('copy', vi.fn());
      emitter.removeAllListeners('zoom');

      expect(emitter.listenerCount('zoom')).toBe(0);
      expect(emitter.listenerCount('copy')).toBe(1);
    });

    it('should clear every event without an argument', () => {
      emitter.on('zoom', vi.fn());
      emitter.on('copy', vi.fn());
      emitter.removeAllListeners();

      expect(emitter.listenerCount('zoom')).toBe(0);
      expect(emitter.listenerCount('copy')).toBe(0);
    });
  });
});
