/**
 * Privilege Service
 *
 * Asks for the administrator password once, then keeps the sudo timestamp
 * fresh from a detached shell loop. The loop checks the parent PID on every
 * pass and exits once the parent is gone.
 */

import { SUDO_KEEPALIVE_SECONDS } from '../config';
import { describeFailure, type BackgroundProcess, type CommandRunner } from './shared/exec';
import { result, type StepResult } from './shared/results';

export function keepAliveScript(parentPid: number, intervalSeconds: number = SUDO_KEEPALIVE_SECONDS): string {
  return `while true; do sudo -n true; sleep ${intervalSeconds}; kill -0 ${parentPid} || exit; done 2>/dev/null`;
}

export class SudoSession {
  private keepAlive: BackgroundProcess | null = null;

  constructor(private readonly runner: CommandRunner) {}

  /**
   * `sudo -v` on the terminal. Denial is reported, not thrown; later
   * privileged commands will fail on their own.
   */
  acquire(): StepResult {
    const res = this.runner.run('sudo', ['-v'], { interactive: true });
    return res.status === 0
      ? result('privileges', 'sudo', 'applied')
      : result('privileges', 'sudo', 'failed', describeFailure(res));
  }

  startKeepAlive(parentPid: number = process.pid): void {
    if (this.keepAlive) return;
    this.keepAlive = this.runner.runBackground('/bin/sh', ['-c', keepAliveScript(parentPid)]);
  }

  get active(): boolean {
    return this.keepAlive !== null;
  }

  stop(): void {
    this.keepAlive?.stop();
    this.keepAlive = null;
  }
}
