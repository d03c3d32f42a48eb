import { execFile } from 'child_process';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import type { CodeSandbox, SandboxRunRequest, SandboxRunResult } from '../types';
import { SandboxError } from '../errors';

export interface LocalSandboxOptions {
  interpreter: string;
  /** Extra environment merged over process.env */
  env?: Record<string, string>;
  maxBufferBytes?: number;
}

/**
 * Runs the program as a child process of this one. The only isolation is a
 * throwaway working directory and a SIGKILL at the deadline.
 */
export class LocalProcessSandbox implements CodeSandbox {
  readonly name = 'local';

  constructor(private options: LocalSandboxOptions) {}

  async run(request: SandboxRunRequest): Promise<SandboxRunResult> {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'codesmith-'));
    const file = path.join(dir, `main${request.fileExtension ?? '.py'}`);

    try {
      await fs.writeFile(file, request.source, 'utf-8');
      return await this.execute(file, dir, request.timeoutSeconds);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  }

  private execute(file: string, cwd: string, timeoutSeconds: number): Promise<SandboxRunResult> {
    const started = Date.now();
    const interpreter = this.options.interpreter;

    return new Promise((resolve, reject) => {
      execFile(
        interpreter,
        [file],
        {
          cwd,
          timeout: Math.max(1, Math.round(timeoutSeconds * 1000)),
          killSignal: 'SIGKILL',
          maxBuffer: this.options.maxBufferBytes ?? 10 * 1024 * 1024,
          env: { ...process.env, ...this.options.env },
          encoding: 'utf8',
        },
        (error, stdout, stderr) => {
          const durationMs = Date.now() - started;
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr, timedOut: false, durationMs });
            return;
          }
          if (typeof error.code === 'string') {
            reject(new SandboxError(`Could not run ${interpreter}: ${error.code}`, error));
            return;
          }
          const timedOut = error.killed === true && error.signal === 'SIGKILL';
          resolve({ exitCode: typeof error.code === 'number' ? error.code : null, stdout, stderr, timedOut, durationMs });
        },
      );
    });
  }
}
