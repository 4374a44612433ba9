// src/test/index.ts
import { readFileSync } from 'node:fs';
import { rm } from 'node:fs/promises';

import { sleep } from '@/runner/exec/util';

/**
 * Remove a temp directory, retrying while a just-killed child still holds
 * files open (EBUSY/ENOTEMPTY/EPERM on Windows runners).
 */
export const rmDirWithRetries = async (dir: string, attempts = 10): Promise<void> => {
  for (let i = 1; ; i += 1) {
    try {
      await rm(dir, { recursive: true, force: true });
      return;
    } catch (e) {
      const code = e instanceof Error && 'code' in e ? e.code : undefined;
      const retryable = code === 'EBUSY' || code === 'ENOTEMPTY' || code === 'EPERM';
      if (!retryable || i >= attempts) throw e;
      await sleep(50 * i);
    }
  }
};

/** True when /proc shows `pid` as an unreaped zombie (Linux only). */
const isZombie = (pid: number): boolean => {
  let stat: string;
  try {
    stat = readFileSync(`/proc/${pid.toString()}/stat`, 'utf8');
  } catch {
    return false;
  }
  // "<pid> (<comm>) <state> ..."; comm may itself contain parentheses.
  return stat.charAt(stat.lastIndexOf(')') + 2) === 'Z';
};

/**
 * True while `pid` names a live process. An orphan killed under a parent
 * that never reaps it stays a zombie; that counts as gone.
 */
export const isAlive = (pid: number): boolean => {
  try {
    process.kill(pid, 0);
  } catch (e) {
    return e instanceof Error && 'code' in e && e.code === 'EPERM';
  }
  return !isZombie(pid);
};
