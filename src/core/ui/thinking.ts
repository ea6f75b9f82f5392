/**
 * UI Feedback Module for LLM Operations
 *
 * A spinner with rotating phrases shown while waiting on the model.
 * Only meaningful on an interactive terminal.
 */

/**
 * Stops the thinking animation and clears its line
 */
export type StopFunction = () => void;

const SPINNER_FRAMES: string[] = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];

/**
 * Starts a terminal spinner with changing text phrases.
 * @param phrases - Phrases to rotate through, one every ten seconds
 * @param stream - Terminal to draw on
 * @returns A function to stop the animation and clear the line.
 */
export function startThinking(
  phrases: string[] = getThinkingPhrasesForCommandHelp(),
  stream: NodeJS.WriteStream = process.stdout
): StopFunction {
  let seconds = 0;
  let spinnerFrame = 0;
  let currentPhrase = phrases[0] ?? 'Thinking';

  const updateDisplay = (): void => {
    stream.clearLine(0);
    stream.cursorTo(0);
    stream.write(`${SPINNER_FRAMES[spinnerFrame]} ${currentPhrase} (${seconds}s)`);
  };

  const spinnerInterval = setInterval(() => {
    spinnerFrame = (spinnerFrame + 1) % SPINNER_FRAMES.length;
    updateDisplay();
  }, 80);

  const tick = (): void => {
    currentPhrase = phrases[Math.floor(seconds / 10) % phrases.length] ?? currentPhrase;
    seconds++;
    updateDisplay();
  };
  tick();
  const tickInterval = setInterval(tick, 1000);

  return (): void => {
    clearInterval(tickInterval);
    clearInterval(spinnerInterval);
    stream.clearLine(0);
    stream.cursorTo(0);
  };
}

/**
 * Returns thinking phrases for explaining a command
 */
export function getThinkingPhrasesForCommandHelp(): string[] {
  return [
    'Reading the man page so you don\'t have to...',
    'Skimming the flags...',
    'Looking for the right incantation...',
    'Cross-checking the usage section...',
    'Translating man page into human...',
    'Weighing the options, literally...'
  ].sort(() => Math.random() - 0.5);
}
