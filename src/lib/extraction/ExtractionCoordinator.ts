import { ExtractionMailbox } from './ExtractionMailbox';
import {
  toExtractionError,
  type DocumentAnalysisService,
  type ExtractionSource,
  type SettledExtraction
} from './types';

/**
 * Runs at most one analysis at a time off the render path and posts the
 * settled result into a mailbox for the render loop to poll.
 */
export class ExtractionCoordinator {
  private readonly service: DocumentAnalysisService;
  private mailbox: ExtractionMailbox<SettledExtraction>;
  private inFlight: Promise<void> | null = null;
  private nextRequestId = 1;

  constructor(
    service: DocumentAnalysisService,
    mailbox: ExtractionMailbox<SettledExtraction> = new ExtractionMailbox()
  ) {
    this.service = service;
    this.mailbox = mailbox;
  }

  /**
   * Start an analysis. Returns the request id, or null when a request is
   * still running or its result has not been polled yet.
   */
  request(source: ExtractionSource): number | null {
    if (this.inFlight || !this.mailbox.isEmpty()) {
      return null;
    }

    const requestId = this.nextRequestId++;
    // A service that throws synchronously settles run() before it returns
    const task: Promise<void> = this.run(source, requestId).finally(() => {
      if (this.inFlight === task) {
        this.inFlight = null;
      }
    });
    this.inFlight = task;
    return requestId;
  }

  /**
   * Drain the mailbox. Never blocks.
   */
  poll(): SettledExtraction | null {
    return this.mailbox.take();
  }

  isBusy(): boolean {
    return this.inFlight !== null;
  }

  /**
   * Resolves once the running request (if any) has posted its result.
   */
  async whenSettled(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private async run(source: ExtractionSource, requestId: number): Promise<void> {
    let result: SettledExtraction;
    try {
      const snapshot = await this.service.analyze(source);
      result = { ok: true, requestId, snapshot };
    } catch (error) {
      result = { ok: false, requestId, error: toExtractionError(error) };
    }

    this.mailbox.post(result);
  }
}
