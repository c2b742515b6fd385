import crypto from 'crypto';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { FAKE_KEY_BLOB, FakeWorkstation } from '../testing/fake-workstation';
import { computeSshFingerprint, ensureSshKey, readPublicKey, showPublicKey } from './ssh.service';

describe('computeSshFingerprint', () => {
  it('hashes the decoded key blob', () => {
    const expected = 'SHA256:' + crypto.createHash('sha256').update('test-key').digest('base64').replace(/=+$/, '');
    expect(computeSshFingerprint(`ssh-ed25519 ${FAKE_KEY_BLOB} dev@example.test`)).toBe(expected);
  });

  it('returns unknown for malformed keys', () => {
    expect(computeSshFingerprint('ssh-ed25519')).toBe('unknown');
    expect(computeSshFingerprint('')).toBe('unknown');
  });
});

describe('ensureSshKey', () => {
  let home: string;
  let keyPath: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'ssh-'));
    keyPath = path.join(home, '.ssh', 'id_ed25519');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('generates a keypair when none exists', () => {
    const mac = new FakeWorkstation();

    const res = ensureSshKey(mac, keyPath, 'dev@example.test');

    expect(res).toEqual({ step: 'ssh', target: keyPath, status: 'applied', detail: 'comment dev@example.test' });
    expect(mac.callsTo('ssh-keygen')).toEqual([
      ['-t', 'ed25519', '-C', 'dev@example.test', '-f', keyPath, '-N', ''],
    ]);
    expect(fs.existsSync(keyPath)).toBe(true);
    expect(readPublicKey(keyPath)?.publicKey).toBe(`ssh-ed25519 ${FAKE_KEY_BLOB} dev@example.test`);
  });

  it('creates ~/.ssh with owner-only permissions', () => {
    ensureSshKey(new FakeWorkstation(), keyPath, 'dev@example.test');
    expect(fs.statSync(path.dirname(keyPath)).mode & 0o777).toBe(0o700);
  });

  it('leaves an existing key byte-identical', () => {
    fs.mkdirSync(path.dirname(keyPath), { recursive: true });
    fs.writeFileSync(keyPath, 'existing-private-key');
    fs.writeFileSync(`${keyPath}.pub`, `ssh-ed25519 ${FAKE_KEY_BLOB} old@example.test\n`);
    const mac = new FakeWorkstation();

    const res = ensureSshKey(mac, keyPath, 'new@example.test');

    expect(res.status).toBe('unchanged');
    expect(mac.callsTo('ssh-keygen')).toEqual([]);
    expect(fs.readFileSync(keyPath, 'utf8')).toBe('existing-private-key');
    expect(fs.readFileSync(`${keyPath}.pub`, 'utf8')).toBe(`ssh-ed25519 ${FAKE_KEY_BLOB} old@example.test\n`);
  });

  it('reports a failing ssh-keygen', () => {
    const mac = new FakeWorkstation().failWhen(c => c.command === 'ssh-keygen', { status: 1, stdout: '', stderr: 'Saving key failed' });
    expect(ensureSshKey(mac, keyPath, '')).toEqual({
      step: 'ssh',
      target: keyPath,
      status: 'failed',
      detail: 'exit 1: Saving key failed',
    });
  });

  it('prints the public key and fingerprint', () => {
    ensureSshKey(new FakeWorkstation(), keyPath, 'dev@example.test');
    showPublicKey(keyPath);

    expect(console.log).toHaveBeenCalledWith(`ssh-ed25519 ${FAKE_KEY_BLOB} dev@example.test`);
    expect(console.log).toHaveBeenCalledWith(`Fingerprint: ${computeSshFingerprint(`ssh-ed25519 ${FAKE_KEY_BLOB}`)}`);
  });

  it('warns when the public key is missing', () => {
    showPublicKey(keyPath);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });
});
