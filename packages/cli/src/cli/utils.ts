import ora, { type Ora } from 'ora';

/**
 * Standardized spinner wrapper for consistent UX across CLI commands.
 * Writes to stderr so the report on stdout stays clean.
 */
export class TaskSpinner {
  private spinner: Ora;

  constructor(initialText: string) {
    this.spinner = ora({ text: initialText, stream: process.stderr }).start();
  }

  /**
   * Updates the spinner text while it's still spinning
   */
  update(text: string): void {
    this.spinner.text = text;
  }

  /**
   * Shows success message and stops spinner
   */
  succeed(text: string): void {
    this.spinner.succeed(text);
  }

  /**
   * Shows warning message and stops spinner
   */
  warn(text: string): void {
    this.spinner.warn(text);
  }

  /**
   * Stops the spinner without showing success/fail
   */
  stop(): void {
    this.spinner.stop();
  }
}

