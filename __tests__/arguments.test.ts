import { describe, expect, it } from 'vitest';
import { readArguments } from '../src/cli/arguments.js';

describe('readArguments', () => {
  it.each([
    [['git', 'reset', "'help me unstage'"]],
    [['ls', '--help']],
    [['tar', '-xzf', 'archive.tgz']],
    [['chmod', '007', 'file']],
    [['git', 'checkout', '--', 'file.txt']],
  ])('passes %j through unchanged', async argv => {
    await expect(readArguments(argv)).resolves.toEqual(argv);
  });

  it('keeps a leading --', async () => {
    await expect(readArguments(['--', 'ls'])).resolves.toEqual(['--', 'ls']);
  });

  it('returns nothing for an empty command line', async () => {
    await expect(readArguments([])).resolves.toEqual([]);
  });
});
