import { describe, expect, test } from 'vitest';
import { ArraySink } from './array';
import type { LogEntry } from '../types';

const entry = (message: string): LogEntry => ({
  timestamp: 0,
  type: 'info',
  template: message,
  message,
});

describe('ArraySink', () => {
  test('should store log entries in order', () => {
    const sink = new ArraySink();

    sink.write(entry('first'));
    sink.write(entry('second'));

    expect(sink.getSnapshotFriendlyLogs()).toEqual([
      'info: first',
      'info: second',
    ]);
  });

  test('should store transformed entries when the transformer returns one', () => {
    const sink = new ArraySink({
      transformer: (log) =>
        log.message === 'noisy' ? { ...log, message: 'quiet' } : false,
    });

    sink.write(entry('noisy'));
    sink.write(entry('plain'));

    expect(sink.logs.map((log) => log.message)).toEqual(['quiet', 'plain']);
  });

  test('should ignore writes after close and support clear', () => {
    const sink = new ArraySink();

    sink.write(entry('kept'));
    sink.clear();
    expect(sink.logs).toHaveLength(0);

    sink.close();
    sink.write(entry('dropped'));
    expect(sink.logs).toHaveLength(0);
  });
});
