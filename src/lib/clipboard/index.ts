/**
 * Clipboard module: plain-text copy through the async Clipboard API.
 */

export { ClipboardManager } from './ClipboardManager';
export type { ClipboardEvents, ClipboardWriter } from './ClipboardManager';
