import { describe, expect, it } from 'vitest';
import {
  FALLBACK_EXPLANATION,
  formatStructuredReply,
  parseStructuredResponse,
  type LLMResponse,
} from '../src/core/responseParser.js';

describe('parseStructuredResponse', () => {
  it('reads all four fields', () => {
    const raw = [
      'EXPLANATION: List files',
      'COMMAND: ls -la',
      'WARNINGS: Output can be long',
      'INFO: Hidden files start with a dot',
    ].join('\n');

    expect(parseStructuredResponse(raw)).toEqual({
      explanation: 'List files',
      recommendedCommand: 'ls -la',
      warnings: 'Output can be long',
      additionalInfo: 'Hidden files start with a dot',
    });
  });

  it('falls back when there is no explanation', () => {
    expect(parseStructuredResponse('Sure! Here is what I think.')).toEqual({ explanation: FALLBACK_EXPLANATION });
    expect(parseStructuredResponse('')).toEqual({ explanation: FALLBACK_EXPLANATION });
  });

  it('treats NONE as absent in optional fields only', () => {
    const response = parseStructuredResponse('EXPLANATION: NONE\nCOMMAND: NONE\nWARNINGS: NONE\nINFO: NONE');

    expect(response).toEqual({ explanation: 'NONE' });
    expect('recommendedCommand' in response).toBe(false);
    expect('warnings' in response).toBe(false);
  });

  it('keeps the last value of a repeated field', () => {
    expect(parseStructuredResponse('EXPLANATION: first\nEXPLANATION: second').explanation).toBe('second');
  });

  it('lets a later NONE clear an earlier command', () => {
    expect(parseStructuredResponse('EXPLANATION: x\nCOMMAND: ls\nCOMMAND: NONE')).toEqual({ explanation: 'x' });
  });

  it('ignores narrative lines, indentation and carriage returns', () => {
    const raw = 'Here you go:\r\n\r\n   INFO: last  \r\n  COMMAND: git status\r\nEXPLANATION: Show state\r\nThanks!';

    expect(parseStructuredResponse(raw)).toEqual({
      explanation: 'Show state',
      recommendedCommand: 'git status',
      additionalInfo: 'last',
    });
  });

  it('requires a space after the colon', () => {
    expect(parseStructuredResponse('EXPLANATION: ok\nCOMMAND:ls')).toEqual({ explanation: 'ok' });
  });

  it('only matches a prefix at the start of a line', () => {
    expect(parseStructuredResponse('EXPLANATION: ok\nThe COMMAND: rm is dangerous')).toEqual({ explanation: 'ok' });
  });

  it('accepts its own formatted output unchanged', () => {
    const full: LLMResponse = {
      explanation: 'Unstage changes',
      recommendedCommand: 'git reset HEAD',
      warnings: 'Unstages everything',
      additionalInfo: 'Changes stay in the working tree',
    };
    const minimal: LLMResponse = { explanation: 'Nothing to run' };

    expect(parseStructuredResponse(formatStructuredReply(full))).toEqual(full);
    expect(parseStructuredResponse(formatStructuredReply(minimal))).toEqual(minimal);
  });
});

describe('formatStructuredReply', () => {
  it('writes NONE for absent fields', () => {
    expect(formatStructuredReply({ explanation: 'x', warnings: 'careful' })).toBe(
      'EXPLANATION: x\nCOMMAND: NONE\nWARNINGS: careful\nINFO: NONE',
    );
  });
});
