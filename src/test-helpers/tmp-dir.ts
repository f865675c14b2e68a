import fs from 'fs/promises';
import os from 'os';
import path from 'path';

/**
 * Creates a fresh directory under the OS temp dir for one test
 */
export async function createTempDir(prefix = 'support-agent-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
