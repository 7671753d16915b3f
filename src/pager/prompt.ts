/**
 * Continue prompt shown between pages
 */

import * as readline from 'readline';

/** Answer that stops paging */
export const QUIT_ANSWER = 'q';

export const CONTINUE_PROMPT = "Press Enter to continue or 'q' to exit...";

export interface PromptStreams {
  /** Where the answer is read from (default: stdin) */
  input?: NodeJS.ReadableStream;
  /** Where the question is written (default: stdout) */
  output?: NodeJS.WritableStream;
}

/**
 * Ask a question and resolve with the line typed in answer.
 * End of input resolves with the quit answer.
 */
export function readLine(question: string, streams: PromptStreams = {}): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({
      input: streams.input ?? process.stdin,
      output: streams.output ?? process.stdout,
    });

    let answered = false;
    rl.on('close', () => {
      if (!answered) {
        resolve(QUIT_ANSWER);
      }
    });

    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
}

/**
 * Whether a prompt answer asks to stop
 */
export function isQuitAnswer(answer: string): boolean {
  return answer.trim() === QUIT_ANSWER;
}
