/**
 * Simple spinner utility for showing progress on stderr.
 * Animates only when stderr is a terminal; otherwise prints the message once.
 */

export class Spinner {
  private intervalId: NodeJS.Timeout | null = null;
  private message: string;
  private frames: string[];
  private currentFrame: number = 0;
  private isRunning: boolean = false;
  private stream: NodeJS.WriteStream;

  constructor(message: string = 'Loading...', stream: NodeJS.WriteStream = process.stderr) {
    this.message = message;
    this.stream = stream;
    this.frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  }

  /**
   * Start the spinner animation
   */
  start(): void {
    if (this.isRunning) {
      return;
    }

    this.isRunning = true;
    this.currentFrame = 0;

    if (!this.stream.isTTY) {
      this.stream.write(`${this.message}\n`);
      return;
    }

    // Hide cursor
    this.stream.write('\x1B[?25l');

    this.intervalId = setInterval(() => {
      const frame = this.frames[this.currentFrame % this.frames.length];
      this.stream.write(`\r${frame} ${this.message}`);
      this.currentFrame++;
    }, 80);
  }

  /**
   * Update the spinner message
   */
  update(message: string): void {
    this.message = message;
  }

  /**
   * Stop the spinner
   */
  stop(): void {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;

    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }

    if (this.stream.isTTY) {
      // Clear the spinner line and show cursor again
      this.stream.write('\r' + ' '.repeat(this.stream.columns || 80) + '\r');
      this.stream.write('\x1B[?25h');
    }
  }
}
