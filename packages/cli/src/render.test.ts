import { describe, it, expect } from 'vitest';
import { renderCLIView, stripAnsi } from './render.js';
import type { CLIErrorView } from '@picklesmith/core';
import { ErrorCode } from '@picklesmith/core';

describe('renderCLIView', () => {
  it('renders title, setting, value and workaround lines', () => {
    const view: CLIErrorView = {
      title: 'Error E103: unknown mutator "fuzz"',
      code: ErrorCode.UNKNOWN_MUTATOR,
      setting: 'mutators',
      excerpt: 'fuzz',
      workaround: 'Use one of: all, bitflip',
      colors: false,
      terminalWidth: 80,
    };

    const lines = stripAnsi(renderCLIView(view)).split('\n');
    expect(lines).toEqual([
      '❌ Error E103: unknown mutator "fuzz"',
      '📍 Setting: mutators',
      'Value: fuzz',
      '💡 Use one of: all, bitflip',
    ]);
  });

  it('applies ANSI colors when enabled', () => {
    const view: CLIErrorView = {
      title: 'Error E500: Internal error',
      code: ErrorCode.INTERNAL_ERROR,
      colors: true,
      terminalWidth: 80,
    };
    const out = renderCLIView(view);
    expect(out.includes('\u001B[31m')).toBe(true);
    expect(stripAnsi(out)).toBe('❌ Error E500: Internal error');
  });

  it('wraps content based on terminalWidth', () => {
    const view: CLIErrorView = {
      title: 'Error E103: unknown mutator "fuzz"',
      code: ErrorCode.UNKNOWN_MUTATOR,
      workaround: 'Use one of: all, bitflip, boundary',
      colors: false,
      terminalWidth: 30,
    };
    expect(renderCLIView(view)).toBe(
      [
        '❌ Error E103: unknown mutator "fuzz"',
        '💡 Use one of: all, bitflip,',
        'boundary',
      ].join('\n')
    );
  });

  it('adds the cause last', () => {
    const view: CLIErrorView = {
      title: 'Error E400: cannot write out.pkl',
      code: ErrorCode.OUTPUT_WRITE_FAILED,
      cause: 'EACCES: permission denied',
      colors: false,
      terminalWidth: 80,
    };
    expect(renderCLIView(view).split('\n')).toEqual([
      '❌ Error E400: cannot write out.pkl',
      'Caused by: EACCES: permission denied',
    ]);
  });
});
