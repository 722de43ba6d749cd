/**
 * Progress display for CLI
 *
 * Displays pipeline progress to stderr for clean stdout output.
 */

import type { PipelineProgressEvent } from '../pipeline/types.js';

/**
 * Progress display options
 */
export interface ProgressOptions {
  /** Suppress progress output */
  quiet?: boolean;
  /** Output in JSON format (disables progress display) */
  json?: boolean;
}

/**
 * Progress display class
 *
 * Handles progress output to stderr with in-place updates.
 */
export class ProgressDisplay {
  private quiet: boolean;
  private json: boolean;
  private lastLineLength = 0;
  private isTerminal: boolean;

  constructor(options: ProgressOptions = {}) {
    this.quiet = options.quiet === true;
    this.json = options.json === true;
    this.isTerminal = process.stderr.isTTY === true;
  }

  /**
   * Clear the current progress line
   */
  private clearLine(): void {
    if (this.isTerminal) {
      process.stderr.write('\r' + ' '.repeat(this.lastLineLength) + '\r');
    }
  }

  /**
   * Write a progress line (in-place update)
   */
  private writeLine(text: string): void {
    if (this.isTerminal) {
      this.clearLine();
      process.stderr.write(text);
      this.lastLineLength = text.length;
    } else {
      process.stderr.write(text + '\n');
    }
  }

  /**
   * Write a permanent message (moves to new line)
   */
  private writeMessage(text: string): void {
    if (this.isTerminal) {
      this.clearLine();
    }
    process.stderr.write(text + '\n');
    this.lastLineLength = 0;
  }

  /**
   * Handle a pipeline progress event
   */
  handleProgress(event: PipelineProgressEvent): void {
    if (this.quiet || this.json) {
      return;
    }

    const position = `[${String(event.index ?? 0)}/${String(event.total ?? 0)}]`;

    switch (event.type) {
      case 'started':
        this.writeMessage(`Running ${String(event.total ?? 0)} queries...`);
        break;

      case 'query_started':
        this.writeLine(`${position} ${event.file ?? ''}`);
        break;

      case 'query_succeeded':
        this.writeLine(`${position} ${event.file ?? ''} → ${String(event.rowCount ?? 0)} rows`);
        break;

      case 'query_failed':
        this.writeMessage(`${position} ${event.file ?? ''} failed: ${event.error ?? 'Unknown error'}`);
        break;

      case 'query_skipped':
        this.writeMessage(`${position} ${event.file ?? ''} skipped`);
        break;

      case 'completed':
        this.clearLine();
        this.lastLineLength = 0;
        break;
    }
  }

  /**
   * Create a progress callback function
   */
  createCallback(): (event: PipelineProgressEvent) => void {
    return (event: PipelineProgressEvent): void => {
      this.handleProgress(event);
    };
  }

  /**
   * Finalize progress display (ensure clean state)
   */
  finish(): void {
    if (this.isTerminal && this.lastLineLength > 0) {
      this.clearLine();
    }
  }
}

/**
 * Create a progress display with options
 */
export function createProgressDisplay(options: ProgressOptions = {}): ProgressDisplay {
  return new ProgressDisplay(options);
}
