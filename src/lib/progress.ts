/**
 * Operator-facing progress lines
 *
 * Workflows report each step through a ProgressReporter instead of writing to
 * the console directly, so the CLI decides where the lines go.
 */

export interface ProgressReporter {
  /** Report one line of progress */
  step: (message: string) => void;
}

/**
 * Reporter that writes each line to a stream (stdout by default)
 */
export function createStreamReporter(
  stream: NodeJS.WritableStream = process.stdout,
): ProgressReporter {
  return {
    step(message: string): void {
      stream.write(`${message}\n`);
    },
  };
}

/**
 * Reporter that drops every line
 */
export const silentReporter: ProgressReporter = {
  step: () => undefined,
};
