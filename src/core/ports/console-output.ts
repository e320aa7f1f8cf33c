/**
 * Plain console OutputPort, the fallback when no interactive UI is wired in.
 * Confirmations answer with their default.
 */

import type { OutputPort, UnifiedSpinner } from './output.js';

export function createConsoleOutput(write: (line: string) => void = console.log): OutputPort {
  return {
    info(message: string): void {
      write(message);
    },

    step(message: string): void {
      write(message);
    },

    message(message: string): void {
      write(message);
    },

    success(message: string): void {
      write(`✓ ${message}`);
    },

    error(message: string): void {
      write(`✗ ${message}`);
    },

    warn(message: string): void {
      write(`⚠ ${message}`);
    },

    note(content: string, title?: string): void {
      write(title ? `\n${title}\n${content}` : `\n${content}`);
    },

    async confirm(_message: string, options?: { initial?: boolean }): Promise<boolean> {
      return options?.initial ?? false;
    },

    spinner(): UnifiedSpinner {
      let msg = '';
      return {
        start(message: string) {
          msg = message;
          write(`… ${message}`);
        },
        stop(finalMessage?: string) {
          write(`✓ ${finalMessage ?? msg}`);
        },
        message(text: string) {
          msg = text;
        },
      };
    },
  };
}

export const consoleOutput: OutputPort = createConsoleOutput();

/**
 * Same as consoleOutput but on stderr, for commands whose stdout is data.
 */
export const stderrOutput: OutputPort = createConsoleOutput(line => console.error(line));

/**
 * OutputPort that discards everything; confirmations answer with their default.
 */
export const silentOutput: OutputPort = {
  info(): void {},
  step(): void {},
  message(): void {},
  success(): void {},
  error(): void {},
  warn(): void {},
  note(): void {},
  async confirm(_message: string, options?: { initial?: boolean }): Promise<boolean> {
    return options?.initial ?? false;
  },
  spinner(): UnifiedSpinner {
    return { start() {}, stop() {}, message() {} };
  },
};
