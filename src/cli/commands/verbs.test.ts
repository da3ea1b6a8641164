import { afterEach, describe, expect, it, vi } from 'vitest';
import { runVerbs } from './verbs.js';

function collectLogs() {
  const logs: string[] = [];
  const logSpy = vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    logs.push(args.join(' '));
  });

  return {
    logs,
    restore: () => logSpy.mockRestore(),
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('verbs command', () => {
  it('lists every standard verb in code order', () => {
    const { logs, restore } = collectLogs();
    runVerbs({});
    restore();

    expect(logs).toHaveLength(17);
    expect(logs[0]).toBe('Standard verbs (15 total):');
    expect(logs[1]).toBe('');
    expect(logs[2]).toBe('  ANLY    Analyze input data or content');
    expect(logs[16]).toBe('  XTRCT   Extract specific fields or values');
  });

  it('filters by code or meaning', () => {
    const { logs, restore } = collectLogs();
    runVerbs({ search: 'retry' });
    restore();

    expect(logs).toEqual(["Verbs matching 'retry':", '', '  RETRY   Retry the previous failed task']);
  });

  it('reports an empty search', () => {
    const { logs, restore } = collectLogs();
    runVerbs({ search: 'teleport' });
    restore();

    expect(logs).toEqual(["No verbs found matching 'teleport'"]);
  });

  it('prints JSON', () => {
    const { logs, restore } = collectLogs();
    runVerbs({ search: 'halt', json: true });
    restore();

    expect(JSON.parse(logs.join('\n'))).toEqual({ HALT: 'Stop pipeline execution immediately' });
  });
});
