/**
 * Unit tests for InteractionController
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { HitTestManager } from '../../../lib/hit-test';
import { InteractionController } from '../../../lib/interaction';
import type { InteractionContext } from '../../../lib/interaction';
import { resolveOverlayOptions } from '../../../lib/types';

const TEXTS: Record<string, string> = { a: 'Alpha', b: 'Beta' };

describe('InteractionController', () => {
  let hitTest: HitTestManager;
  let controller: InteractionController;
  let time: number;
  let context: InteractionContext;

  function register(itemId: string, x: number, y: number, width: number, height: number): void {
    const rect = { x, y, width, height };
    hitTest.register({ type: 'item', itemId, rect, bounds: rect });
  }

  function withEditMode(editMode: boolean): void {
    context = { ...context, editMode };
  }

  beforeEach(() => {
    time = 1000;
    hitTest = new HitTestManager();
    controller = new InteractionController(hitTest, resolveOverlayOptions({ now: () => time }));
    context = {
      zoom: 1,
      editMode: false,
      effectiveText: id => TEXTS[id]
    };
    // Item "a" covers x 90..190, y 120..140
    register('a', 90, 120, 100, 20);
  });

  describe('hover', () => {
    it('should hover an item under the pointer', () => {
      const outcome = controller.pointerMove({ x: 100, y: 125 }, context);

      expect(outcome.hoveredId).toBe('a');
      expect(outcome.cursor).toBe('pointer');
      expect(outcome.consumed).toBe(false);
      expect(controller.getPhase()).toBe('hovering');
    });

    it('should show the move cursor in edit mode', () => {
      withEditMode(true);
      expect(controller.pointerMove({ x: 100, y: 125 }, context).cursor).toBe('move');
    });

    it('should go idle over empty canvas', () => {
      controller.pointerMove({ x: 100, y: 125 }, context);
      const outcome = controller.pointerMove({ x: 10, y: 10 }, context);

      expect(outcome.hoveredId).toBeNull();
      expect(outcome.cursor).toBe('default');
      expect(controller.getPhase()).toBe('idle');
    });

    it('should prefer the topmost item', () => {
      register('b', 150, 120, 100, 20);
      expect(controller.pointerMove({ x: 160, y: 125 }, context).hoveredId).toBe('b');
    });

    it('should refresh hover against new rects', () => {
      controller.pointerMove({ x: 100, y: 125 }, context);
      hitTest.clear();
      controller.refreshHover({ x: 100, y: 125 });

      expect(controller.getHoveredId()).toBeNull();
      expect(controller.getPhase()).toBe('idle');
    });

    it('should clear hover when refreshed without a pointer', () => {
      controller.pointerMove({ x: 100, y: 125 }, context);
      controller.refreshHover(null);
      expect(controller.getHoveredId()).toBeNull();
    });
  });

  describe('click to copy', () => {
    it('should copy the effective text of a clicked item', () => {
      const down = controller.pointerDown({ x: 100, y: 125 }, context);
      expect(down.consumed).toBe(true);
      expect(down.cursor).toBe('pointer');
      expect(controller.getPhase()).toBe('pressing');

      const up = controller.pointerUp({ x: 100, y: 125 }, context);
      expect(up.copiedText).toBe('Alpha');
      expect(up.copiedItemId).toBe('a');
      expect(up.consumed).toBe(true);
      expect(controller.getPhase()).toBe('hovering');
    });

    it('should still click after movement under the drag threshold', () => {
      controller.pointerDown({ x: 100, y: 125 }, context);
      const move = controller.pointerMove({ x: 102, y: 125 }, context);
      expect(move.panDelta).toBeUndefined();
      expect(move.consumed).toBe(true);

      expect(controller.pointerUp({ x: 102, y: 125 }, context).copiedText).toBe('Alpha');
    });

    it('should not copy when released over another item', () => {
      controller.pointerDown({ x: 100, y: 125 }, context);
      controller.pointerMove({ x: 101, y: 125 }, context);
      hitTest.clear();
      register('b', 90, 120, 100, 20);

      expect(controller.pointerUp({ x: 101, y: 125 }, context).copiedText).toBeUndefined();
    });

    it('should not copy an item without text', () => {
      const noText = { ...context, effectiveText: () => undefined };
      controller.pointerDown({ x: 100, y: 125 }, noText);
      const up = controller.pointerUp({ x: 100, y: 125 }, noText);

      expect(up.copiedText).toBeUndefined();
      expect(up.consumed).toBe(true);
    });

    it('should not copy a press on empty canvas', () => {
      controller.pointerDown({ x: 10, y: 10 }, context);
      const up = controller.pointerUp({ x: 10, y: 10 }, context);

      expect(up.copiedText).toBeUndefined();
      expect(up.consumed).toBe(true);
      expect(controller.getPhase()).toBe('idle');
    });

    it('should ignore non-primary buttons', () => {
      const down = controller.pointerDown({ x: 100, y: 125, button: 2 }, context);

      expect(down.consumed).toBe(false);
      expect(controller.getPhase()).toBe('idle');
      expect(controller.pointerUp({ x: 100, y: 125, button: 2 }, context).copiedText).toBeUndefined();
    });

    it('should copy on both clicks of a quick double click outside edit mode', () => {
      controller.pointerDown({ x: 100, y: 125 }, context);
      controller.pointerUp({ x: 100, y: 125 }, context);
      time += 100;
      controller.pointerDown({ x: 100, y: 125 }, context);
      const second = controller.pointerUp({ x: 100, y: 125 }, context);

      expect(second.copiedText).toBe('Alpha');
      expect(second.editItemId).toBeUndefined();
    });
  });

  describe('view drag', () => {
    it('should pan by the pointer travel', () => {
      controller.pointerDown({ x: 10, y: 10 }, context);

      const first = controller.pointerMove({ x: 20, y: 10 }, context);
      expect(first.panDelta).toEqual({ x: 10, y: 0 });
      expect(first.cursor).toBe('grabbing');
      expect(controller.getPhase()).toBe('dragging-view');

      const second = controller.pointerMove({ x: 25, y: 13 }, context);
      expect(second.panDelta).toEqual({ x: 5, y: 3 });

      const up = controller.pointerUp({ x: 25, y: 13 }, context);
      expect(up.copiedText).toBeUndefined();
      expect(up.consumed).toBe(true);
    });

    it('should pan when dragging from an item outside edit mode', () => {
      controller.pointerDown({ x: 100, y: 125 }, context);
      const move = controller.pointerMove({ x: 120, y: 125 }, context);

      expect(move.panDelta).toEqual({ x: 20, y: 0 });
      expect(move.itemOffsetDelta).toBeUndefined();
      expect(controller.pointerUp({ x: 120, y: 125 }, context).copiedText).toBeUndefined();
    });

    it('should not drag a command press on empty canvas', () => {
      controller.pointerDown({ x: 10, y: 10, modifiers: { command: true } }, context);
      const move = controller.pointerMove({ x: 50, y: 50 }, context);

      expect(move.panDelta).toBeUndefined();
      expect(move.consumed).toBe(true);
      expect(controller.getPhase()).toBe('pressing');
    });

    it('should cancel a drag when the pointer leaves', () => {
      controller.pointerDown({ x: 10, y: 10 }, context);
      controller.pointerMove({ x: 20, y: 10 }, context);
      controller.pointerLeave(context);

      expect(controller.getPhase()).toBe('idle');
      const move = controller.pointerMove({ x: 30, y: 10 }, context);
      expect(move.panDelta).toBeUndefined();
      expect(move.consumed).toBe(false);
    });
  });

  describe('edit mode', () => {
    beforeEach(() => {
      withEditMode(true);
    });

    it('should move the pressed item', () => {
      controller.pointerDown({ x: 100, y: 125 }, context);
      const move = controller.pointerMove({ x: 110, y: 120 }, context);

      expect(move.itemOffsetDelta).toEqual({ itemId: 'a', dx: 10, dy: -5 });
      expect(move.panDelta).toBeUndefined();
      expect(move.cursor).toBe('move');
      expect(controller.getDraggingId()).toBe('a');

      controller.pointerUp({ x: 110, y: 120 }, context);
      expect(controller.getDraggingId()).toBeNull();
    });

    it('should pan when dragging empty canvas', () => {
      controller.pointerDown({ x: 10, y: 10 }, context);
      expect(controller.pointerMove({ x: 10, y: 30 }, context).panDelta).toEqual({ x: 0, y: 20 });
    });

    it('should request editing on a double click', () => {
      controller.pointerDown({ x: 100, y: 125 }, context);
      expect(controller.pointerUp({ x: 100, y: 125 }, context).copiedText).toBe('Alpha');

      time += 100;
      controller.pointerDown({ x: 101, y: 126 }, context);
      const second = controller.pointerUp({ x: 101, y: 126 }, context);

      expect(second.editItemId).toBe('a');
      expect(second.copiedText).toBeUndefined();
    });

    it('should start over after a double click', () => {
      controller.pointerDown({ x: 100, y: 125 }, context);
      controller.pointerUp({ x: 100, y: 125 }, context);
      time += 50;
      controller.pointerDown({ x: 100, y: 125 }, context);
      controller.pointerUp({ x: 100, y: 125 }, context);
      time += 50;
      controller.pointerDown({ x: 100, y: 125 }, context);

      expect(controller.pointerUp({ x: 100, y: 125 }, context).copiedText).toBe('Alpha');
    });

    it('should treat slow or distant second clicks as single clicks', () => {
      controller.pointerDown({ x: 100, y: 125 }, context);
      controller.pointerUp({ x: 100, y: 125 }, context);
      time += 300;
      controller.pointerDown({ x: 100, y: 125 }, context);
      expect(controller.pointerUp({ x: 100, y: 125 }, context).editItemId).toBeUndefined();

      time += 100;
      controller.pointerDown({ x: 110, y: 125 }, context);
      controller.pointerMove({ x: 110, y: 125 }, context);
      expect(controller.pointerUp({ x: 110, y: 125 }, context).editItemId).toBeUndefined();
    });
  });

  describe('wheel', () => {
    it('should pan without a modifier', () => {
      const outcome = controller.wheel({ x: 0, y: 0, deltaX: -4, deltaY: 30 }, context);

      expect(outcome.panDelta).toEqual({ x: -4, y: 30 });
      expect(outcome.consumed).toBe(true);
    });

    it('should ignore a zero delta', () => {
      expect(controller.wheel({ x: 0, y: 0, deltaX: 0, deltaY: 0 }, context).consumed).toBe(false);
    });

    it('should zoom with the command modifier', () => {
      const outcome = controller.wheel(
        { x: 0, y: 0, deltaX: 0, deltaY: 100, modifiers: { command: true } },
        context
      );

      expect(outcome.zoom).toBeCloseTo(1.1, 10);
      expect(outcome.panDelta).toBeUndefined();
    });

    it('should clamp wheel zoom', () => {
      const outcome = controller.wheel(
        { x: 0, y: 0, deltaX: 0, deltaY: 1000, modifiers: { command: true } },
        { ...context, zoom: 2.9 }
      );
      expect(outcome.zoom).toBe(3);
    });
  });

  describe('keys', () => {
    const command = { command: true };

    it('should clear search on Escape', () => {
      const outcome = controller.key({ key: 'Escape' }, context);
      expect(outcome.clearSearch).toBe(true);
      expect(outcome.consumed).toBe(true);
    });

    it('should cancel a drag on Escape', () => {
      controller.pointerDown({ x: 10, y: 10 }, context);
      controller.pointerMove({ x: 20, y: 10 }, context);
      controller.key({ key: 'Escape' }, context);

      expect(controller.getPhase()).toBe('idle');
      expect(controller.pointerMove({ x: 30, y: 10 }, context).panDelta).toBeUndefined();
    });

    it('should step zoom with command plus and minus', () => {
      expect(controller.key({ key: '=', modifiers: command }, context).zoom).toBeCloseTo(1.2, 10);
      expect(controller.key({ key: '+', modifiers: command }, context).zoom).toBeCloseTo(1.2, 10);
      expect(controller.key({ key: '-', modifiers: command }, context).zoom).toBeCloseTo(1 / 1.2, 10);
    });

    it('should reset the view with command zero', () => {
      expect(controller.key({ key: '0', modifiers: command }, context).resetView).toBe(true);
    });

    it('should leave other keys alone', () => {
      expect(controller.key({ key: '=' }, context).consumed).toBe(false);
      expect(controller.key({ key: 'c', modifiers: command }, context).consumed).toBe(false);
    });
  });

  it('should forget transient state on reset', () => {
    controller.pointerDown({ x: 10, y: 10 }, context);
    controller.reset();

    expect(controller.getPhase()).toBe('idle');
    expect(controller.getHoveredId()).toBeNull();
    expect(controller.pointerMove({ x: 40, y: 10 }, context).panDelta).toBeUndefined();
  });
});
