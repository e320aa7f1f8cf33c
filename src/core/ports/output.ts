/**
 * Output Port Interface
 *
 * Core code reports user-facing progress through this interface instead of
 * writing to the console or @clack/prompts directly.
 *
 * Implementations:
 *   - createClackOutput (CLI): @clack/prompts for interactive terminals
 *   - consoleOutput (default/CI): plain console.log
 */

export interface UnifiedSpinner {
  start(message: string): void;
  stop(finalMessage?: string): void;
  message(text: string): void;
}

export interface OutputPort {
  info(message: string): void;

  /** Display a step/progress indicator */
  step(message: string): void;

  message(message: string): void;

  success(message: string): void;

  error(message: string): void;

  warn(message: string): void;

  /** Display a note block with optional title */
  note(content: string, title?: string): void;

  /** Prompt for a yes/no confirmation */
  confirm(message: string, options?: { initial?: boolean }): Promise<boolean>;

  spinner(): UnifiedSpinner;
}
