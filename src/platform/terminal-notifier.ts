import pc from "picocolors";
import type { Notifier, NotifyOptions } from "../media/capabilities";

export const DEFAULT_NOTIFICATION_DURATION_MS = 4000;
const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
const SPINNER_INTERVAL_MS = 80;
const CLEAR_LINE = "\r\x1b[2K";

export interface NotifierStream {
  write(chunk: string): boolean;
  isTTY?: boolean;
}

/**
 * Shows one status line at a time. On a TTY the line is rewritten in place;
 * elsewhere each notification is printed as its own line and nothing is
 * dismissed.
 */
export class TerminalNotifier implements Notifier {
  private readonly durationMs: number;
  private spinner: NodeJS.Timeout | null = null;
  private dismissal: NodeJS.Timeout | null = null;
  private visible = false;

  constructor(
    private readonly stream: NotifierStream = process.stderr,
    options: { durationMs?: number } = {},
  ) {
    this.durationMs = options.durationMs ?? DEFAULT_NOTIFICATION_DURATION_MS;
  }

  notify(message: string, options: NotifyOptions = {}): void {
    this.hide();
    if (this.stream.isTTY !== true) {
      this.stream.write(`${message}\n`);
      return;
    }

    this.visible = true;
    if (options.showProgress) {
      let frame = 0;
      const render = () => {
        const glyph = SPINNER_FRAMES[frame % SPINNER_FRAMES.length] ?? "";
        this.stream.write(`${CLEAR_LINE}${pc.cyan(glyph)} ${message}`);
        frame += 1;
      };
      render();
      this.spinner = setInterval(render, SPINNER_INTERVAL_MS);
      this.spinner.unref();
      return;
    }

    this.stream.write(`${CLEAR_LINE}${message}`);
    this.dismissal = setTimeout(() => this.hide(), this.durationMs);
    this.dismissal.unref();
  }

  /**
   * Stops pending animation and dismissal and ends the current line, so the
   * last message stays readable above whatever is printed next.
   */
  settle(): void {
    this.stopTimers();
    if (this.visible) {
      this.stream.write("\n");
      this.visible = false;
    }
  }

  /** Removes the current notification, if any. */
  hide(): void {
    this.stopTimers();
    if (this.visible) {
      this.stream.write(CLEAR_LINE);
      this.visible = false;
    }
  }

  private stopTimers(): void {
    if (this.spinner) {
      clearInterval(this.spinner);
      this.spinner = null;
    }
    if (this.dismissal) {
      clearTimeout(this.dismissal);
      this.dismissal = null;
    }
  }
}
