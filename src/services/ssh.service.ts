/**
 * SSH Key Service
 *
 * Generates the workstation's ed25519 key once. An existing key is left
 * exactly as it is; it is not validated or regenerated.
 */

import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import { SSH_KEY_TYPE } from '../config';
import { describeFailure, type CommandRunner } from './shared/exec';
import { THIN_RULE, createLogger, errorMessage } from './shared/log';
import { result, type StepResult } from './shared/results';

const logger = createLogger('ssh');

export interface SshKeyInfo {
  publicKey: string;
  fingerprint: string;
}

/**
 * Compute SSH fingerprint from public key
 */
export function computeSshFingerprint(publicKey: string): string {
  const parts = publicKey.trim().split(/\s+/);
  if (parts.length < 2 || !parts[1]) return 'unknown';
  const keyData = Buffer.from(parts[1], 'base64');
  if (keyData.length === 0) return 'unknown';
  const hash = crypto.createHash('sha256').update(keyData).digest('base64');
  return 'SHA256:' + hash.replace(/=+$/, '');
}

export function readPublicKey(keyPath: string): SshKeyInfo | undefined {
  try {
    const publicKey = fs.readFileSync(`${keyPath}.pub`, 'utf8').trim();
    return { publicKey, fingerprint: computeSshFingerprint(publicKey) };
  } catch {
    return undefined;
  }
}

/**
 * Create the keypair at `keyPath` if the private key file is absent.
 * Empty passphrase; `comment` is usually the git email.
 */
export function ensureSshKey(runner: CommandRunner, keyPath: string, comment: string): StepResult {
  if (fs.existsSync(keyPath)) {
    logger.log('SSH key already exists. Skipping generation.');
    return result('ssh', keyPath, 'unchanged');
  }

  try {
    fs.mkdirSync(path.dirname(keyPath), { recursive: true, mode: 0o700 });
  } catch (err) {
    return result('ssh', keyPath, 'failed', errorMessage(err));
  }

  logger.log(`SSH key not found. Generating a new ${SSH_KEY_TYPE} key...`);
  const res = runner.run('ssh-keygen', ['-t', SSH_KEY_TYPE, '-C', comment, '-f', keyPath, '-N', '']);
  if (res.status !== 0) {
    return result('ssh', keyPath, 'failed', describeFailure(res));
  }

  logger.success('SSH key generated.');
  return result('ssh', keyPath, 'applied', comment ? `comment ${comment}` : undefined);
}

/**
 * Print the public key for copying into a git host.
 */
export function showPublicKey(keyPath: string): void {
  const info = readPublicKey(keyPath);
  if (!info) {
    logger.warn(`No public key at ${keyPath}.pub`);
    return;
  }

  console.log('');
  console.log(THIN_RULE);
  console.log('✅ Your public SSH key is ready. Copy the line below to GitHub/GitLab:');
  console.log(THIN_RULE);
  console.log(info.publicKey);
  console.log(THIN_RULE);
  console.log(`Fingerprint: ${info.fingerprint}`);
}
