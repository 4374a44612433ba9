import { describe, expect, it } from 'vitest';

import { renderEvent, renderMessage } from '@/cli/run/render';
import { NotFoundError, ScriptError } from '@/runner/errors';

describe('run rendering', () => {
  it('renders status transitions', () => {
    expect(
      renderEvent({
        type: 'status',
        key: 'sensor',
        status: { kind: 'streaming', startedAt: 0, pid: 42, endpoint: 'tcp://127.0.0.1:9' },
      }),
    ).toEqual(['sensor: streaming (pid 42, tcp://127.0.0.1:9)']);
    expect(
      renderEvent({
        type: 'status',
        key: 'sensor',
        status: {
          kind: 'failed',
          error: new NotFoundError('script', 'sensor'),
          at: 0,
          attempts: 2,
          retryScheduled: true,
        },
      }),
    ).toEqual(['sensor: failed (attempt 2, restart pending)']);
  });

  it('renders results and output lines', () => {
    expect(renderEvent({ type: 'result', key: 'calc.add', value: 5 })).toEqual([
      'calc.add = 5',
    ]);
    expect(
      renderEvent({ type: 'output', key: 'calc', channel: 'stderr', line: 'warn' }),
    ).toEqual(['calc! warn']);
    expect(
      renderEvent({ type: 'output', key: 'calc', channel: 'stdout', line: 'hi' }),
    ).toEqual(['calc> hi']);
  });

  it('appends the stderr tail of a script error', () => {
    const error = ScriptError.nonZeroExit('calc', 1, null, 'Traceback\nValueError: x\n');
    expect(renderEvent({ type: 'error', key: 'calc', error })).toEqual([
      'calc: exited with code 1',
      '  | Traceback',
      '  | ValueError: x',
    ]);
  });

  it('renders stream messages with id and sequence', () => {
    expect(
      renderMessage({ streamId: 'temp', timestamp: 0, payload: { v: 1 }, seq: 3 }),
    ).toBe('[temp #3] {"v":1}');
  });
});
