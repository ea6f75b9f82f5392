import yargs from 'yargs';

/**
 * Collects the raw arguments after the program name. Option parsing is
 * switched off so that flags such as `-h` reach the target command untouched.
 *
 * yargs consumes a leading `--` as its end-of-options marker; the arguments
 * are returned verbatim in that case so the `--` is not lost.
 */
export async function readArguments(argv: readonly string[]): Promise<string[]> {
  if (argv[0] === '--') {
    return [...argv];
  }

  const parsed = await yargs([...argv])
    .scriptName('help')
    .help(false)
    .version(false)
    .strict(false)
    .parserConfiguration({
      'unknown-options-as-args': true,
      'halt-at-non-option': true,
      'parse-positional-numbers': false,
      'parse-numbers': false
    })
    .parseAsync();

  return parsed._.map(String);
}
