import { describe, expect, test } from 'vitest';
import { CommandStatusPublisher, MemoryStatusPublisher } from './status-publisher';
import { ScriptedCommandRunner } from './test-units';
import { activeStatus, blockedStatus } from './status';

describe('MemoryStatusPublisher', () => {
  test('should keep every published status in order', async () => {
    const publisher = new MemoryStatusPublisher();

    expect(publisher.current).toBeNull();

    await publisher.publish(blockedStatus('Missing relations: shared-db'));
    await publisher.publish(activeStatus('Unit is ready'));

    expect(publisher.current).toEqual({ severity: 'active', message: 'Unit is ready' });
    expect(publisher.getSnapshotFriendlyHistory()).toEqual([
      'blocked: Missing relations: shared-db',
      'active: Unit is ready',
    ]);
  });

  test('should store a copy of the status', async () => {
    const publisher = new MemoryStatusPublisher();
    const status = activeStatus('Unit is ready');

    await publisher.publish(status);
    status.message = 'changed';

    expect(publisher.current?.message).toBe('Unit is ready');
  });
});

describe('CommandStatusPublisher', () => {
  test('should pass severity and message as separate arguments', async () => {
    const runner = new ScriptedCommandRunner();
    const publisher = new CommandStatusPublisher({ runner });

    await publisher.publish(blockedStatus('Missing relations: shared-db'));

    expect(runner.calls).toEqual(['status-set blocked Missing relations: shared-db']);
  });

  test('should reject when the tool fails', async () => {
    const runner = new ScriptedCommandRunner().respond('status-set active ', {
      exitCode: 1,
      stderr: 'not running in a unit context\n',
    });
    const publisher = new CommandStatusPublisher({ runner });

    await expect(publisher.publish(activeStatus())).rejects.toThrow(
      'status-set exited with 1: not running in a unit context',
    );
  });

  test('should use a custom command', async () => {
    const runner = new ScriptedCommandRunner();
    const publisher = new CommandStatusPublisher({ runner, command: '/usr/bin/status-set' });

    await publisher.publish(activeStatus('Unit is ready'));

    expect(runner.calls).toEqual(['/usr/bin/status-set active Unit is ready']);
  });
});
