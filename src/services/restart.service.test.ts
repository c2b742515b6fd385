import { describe, expect, it } from 'vitest';
import { FakeWorkstation } from '../testing/fake-workstation';
import { restartProcesses } from './restart.service';

describe('restartProcesses', () => {
  it('kills running processes and skips absent ones', () => {
    const mac = new FakeWorkstation();

    const results = restartProcesses(mac, ['Finder', 'Dock', 'TextEdit']);

    expect(mac.killed).toEqual(['Finder', 'Dock']);
    expect(results).toEqual([
      { step: 'restart', target: 'Finder', status: 'applied' },
      { step: 'restart', target: 'Dock', status: 'applied' },
      { step: 'restart', target: 'TextEdit', status: 'skipped', detail: 'not running' },
    ]);
  });

  it('passes names with spaces as one argument', () => {
    const mac = new FakeWorkstation();
    mac.running.add('Activity Monitor');

    restartProcesses(mac, ['Activity Monitor']);

    expect(mac.callsTo('killall')).toEqual([['Activity Monitor']]);
  });

  it('treats other exit codes as failures', () => {
    const mac = new FakeWorkstation().failWhen(c => c.command === 'killall', { status: 2, stdout: '', stderr: 'Operation not permitted' });
    expect(restartProcesses(mac, ['Dock'])).toEqual([
      { step: 'restart', target: 'Dock', status: 'failed', detail: 'exit 2: Operation not permitted' },
    ]);
  });
});
