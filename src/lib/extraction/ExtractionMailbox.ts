import { ExtractionError, ExtractionErrorCode } from './types';

/**
 * Single-slot hand-off between an extraction worker and the render loop.
 * The render loop drains it with `take`, which returns and clears the slot
 * in one step.
 */
export class ExtractionMailbox<T> {
  private slot: { value: T } | null = null;

  /**
   * Put a value in the slot. Throws BUSY if the slot is still occupied, so
   * two results can never race.
   */
  post(value: T): void {
    if (this.slot) {
      throw new ExtractionError(
        'Extraction mailbox already holds an undrained result',
        ExtractionErrorCode.BUSY
      );
    }
    this.slot = { value };
  }

  take(): T | null {
    const slot = this.slot;
    this.slot = null;
    return slot ? slot.value : null;
  }

  isEmpty(): boolean {
    return this.slot === null;
  }
}
