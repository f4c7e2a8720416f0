/**
 * Lock file manager to prevent two keepers poking the same deployment
 */

import * as fs from 'fs';
import * as path from 'path';
import { LockFileData, LockFileError } from '../types';
import { LOCK_FILE_NAME } from '../config/constants';

export class LockFileManager {
  private lockFilePath: string;
  private lockData: LockFileData | null = null;

  constructor(baseDir: string = __dirname) {
    this.lockFilePath = path.join(baseDir, LOCK_FILE_NAME);
  }

  /**
   * Signal 0 probes for the process without delivering anything
   */
  private isProcessRunning(pid: number): boolean {
    try {
      process.kill(pid, 0);
      return true;
    } catch (error) {
      return error instanceof Error && 'code' in error && error.code === 'EPERM';
    }
  }

  /**
   * Parse lock file contents; null when missing fields or malformed
   */
  static parse(content: string): LockFileData | null {
    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      return null;
    }
    if (typeof data !== 'object' || data === null) {
      return null;
    }
    const pid = 'pid' in data ? data.pid : undefined;
    const started = 'started' in data ? data.started : undefined;
    const args = 'args' in data ? data.args : undefined;
    if (typeof pid !== 'number' || typeof started !== 'string' || !Array.isArray(args)) {
      return null;
    }
    return { pid, started, args: args.map(String) };
  }

  checkExisting(): { exists: boolean; data: LockFileData | null; isRunning: boolean } {
    if (!fs.existsSync(this.lockFilePath)) {
      return { exists: false, data: null, isRunning: false };
    }
    const data = LockFileManager.parse(fs.readFileSync(this.lockFilePath, 'utf8'));
    return { exists: true, data, isRunning: data !== null && this.isProcessRunning(data.pid) };
  }

  /**
   * Create a lock file for the current process
   */
  create(args: string[]): void {
    const existing = this.checkExisting();

    if (existing.exists && existing.isRunning && existing.data) {
      throw new LockFileError(
        `Keeper is already running\n` +
        `   PID: ${existing.data.pid}\n` +
        `   Started: ${existing.data.started}\n` +
        `\n   To force start (if lock is stale):\n` +
        `   rm ${this.lockFilePath}\n`
      );
    }

    if (existing.exists) {
      this.remove();
    }

    this.lockData = {
      pid: process.pid,
      started: new Date().toISOString(),
      args,
    };
    fs.writeFileSync(this.lockFilePath, JSON.stringify(this.lockData, null, 2));
  }

  remove(): void {
    if (fs.existsSync(this.lockFilePath)) {
      fs.unlinkSync(this.lockFilePath);
    }
    this.lockData = null;
  }

  getLockFilePath(): string {
    return this.lockFilePath;
  }

  getLockData(): LockFileData | null {
    return this.lockData;
  }
}
