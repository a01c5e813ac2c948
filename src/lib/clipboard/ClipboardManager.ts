/**
 * ClipboardManager writes copied item text to the system clipboard.
 */

import { EventEmitter } from '../events/EventEmitter';

export interface ClipboardEvents {
  copy: { success: true; text: string } | { success: false; text: string; error: unknown };
}

/**
 * Minimal slice of the async Clipboard API used here.
 */
export interface ClipboardWriter {
  writeText(text: string): Promise<void>;
}

function systemClipboard(): ClipboardWriter | null {
  if (typeof navigator === 'undefined' || !navigator.clipboard) {
    return null;
  }
  return navigator.clipboard;
}

export class ClipboardManager extends EventEmitter<ClipboardEvents> {
  private resolveClipboard: () => ClipboardWriter | null;

  constructor(clipboard?: ClipboardWriter) {
    super();
    this.resolveClipboard = clipboard ? () => clipboard : systemClipboard;
  }

  /**
   * Copy plain text. Rejects when the clipboard is unavailable or the write
   * is refused.
   */
  async copyText(text: string): Promise<void> {
    const clipboard = this.resolveClipboard();

    try {
      if (!clipboard) {
        throw new Error('Clipboard API is not available');
      }
      await clipboard.writeText(text);
    } catch (error) {
      this.emit('copy', { success: false, text, error });
      throw error;
    }

    this.emit('copy', { success: true, text });
  }
}
