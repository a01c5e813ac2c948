/**
 * Unit tests for ExtractionMailbox
 */
import { describe, it, expect } from 'vitest';
import { ExtractionMailbox } from '../../../lib/extraction/ExtractionMailbox';
import { ExtractionError, ExtractionErrorCode } from '../../../lib/extraction/types';

describe('ExtractionMailbox', () => {
  it('should start empty', () => {
    const mailbox = new ExtractionMailbox<string>();
    expect(mailbox.isEmpty()).toBe(true);
    expect(mailbox.take()).toBeNull();
  });

  it('should hand a posted value to take exactly once', () => {
    const mailbox = new ExtractionMailbox<string>();
    mailbox.post('result');

    expect(mailbox.isEmpty()).toBe(false);
    expect(mailbox.take()).toBe('result');
    expect(mailbox.isEmpty()).toBe(true);
    expect(mailbox.take()).toBeNull();
  });

  it('should reject a post while occupied', () => {
    const mailbox = new ExtractionMailbox<string>();
    mailbox.post('first');

    let thrown: unknown;
    try {
      mailbox.post('second');
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ExtractionError);
    expect(thrown instanceof ExtractionError && thrown.code).toBe(ExtractionErrorCode.BUSY);
    expect(mailbox.take()).toBe('first');
  });

  it('should accept a new post after take', () => {
    const mailbox = new ExtractionMailbox<number>();
    mailbox.post(1);
    mailbox.take();
    mailbox.post(2);

    expect(mailbox.take()).toBe(2);
  });

  it('should carry falsy values', () => {
    const mailbox = new ExtractionMailbox<number>();
    mailbox.post(0);

    expect(mailbox.isEmpty()).toBe(false);
    expect(mailbox.take()).toBe(0);
  });
});
