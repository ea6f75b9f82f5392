import readline from 'readline';

/**
 * Streams a prompt reads from and writes to. Defaults to the process's own.
 */
export interface PromptStreams {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const AFFIRMATIVE_ANSWERS = new Set(['y', 'Y', 'yes']);

/**
 * Whether a typed answer means yes. Surrounding whitespace is ignored.
 */
export function isAffirmative(answer: string | null): boolean {
  return answer !== null && AFFIRMATIVE_ANSWERS.has(answer.trim());
}

/**
 * Prints `question` and reads one line of input.
 * @returns {Promise<string | null>} - The line, or null if input ended first.
 */
export function askLine(question: string, streams: PromptStreams = {}): Promise<string | null> {
  const rl = readline.createInterface({
    input: streams.input ?? process.stdin,
    output: streams.output ?? process.stdout,
    terminal: false,
  });

  return new Promise(resolve => {
    let answered = false;
    rl.on('close', () => {
      if (!answered) resolve(null);
    });
    rl.question(question, answer => {
      answered = true;
      rl.close();
      resolve(answer);
    });
  });
}

/**
 * Prompts the user for a yes/no confirmation in the terminal.
 * @param {string} question - The question to display before the prompt.
 * @returns {Promise<boolean>} - Resolves true for 'y', 'Y' or 'yes'; false otherwise, including end of input.
 */
export async function askYesNo(question: string, streams: PromptStreams = {}): Promise<boolean> {
  const answer = await askLine(`${question} (y/N): `, streams);
  return isAffirmative(answer);
}
