import { spawn } from 'child_process';
import * as fs from 'fs';
import { loaderLogger as logger } from '@core/utils/logger';

export interface WorkerInvocation {
  command: string;
  args: string[];
  /** Complete environment of the child; nothing is inherited */
  env: Record<string, string>;
  /** File receiving the child's stderr */
  stderrFile: string;
  timeoutMs: number;
  cwd?: string;
}

export interface WorkerExit {
  code: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
}

/**
 * Starts the import worker. Rejects only when the process cannot be
 * started; exit status is reported, not thrown.
 */
export interface WorkerLauncher {
  launch(invocation: WorkerInvocation): Promise<WorkerExit>;
}

export class NodeWorkerLauncher implements WorkerLauncher {
  async launch(invocation: WorkerInvocation): Promise<WorkerExit> {
    const stderr = await fs.promises.open(invocation.stderrFile, 'w');

    try {
      return await new Promise<WorkerExit>((resolve, reject) => {
        let settled = false;
        let timedOut = false;

        const child = spawn(invocation.command, invocation.args, {
          cwd: invocation.cwd,
          env: invocation.env,
          stdio: ['ignore', 'ignore', stderr.fd],
          windowsHide: true
        });

        const timer = setTimeout(() => {
          timedOut = true;
          logger.warn(`Import worker exceeded ${invocation.timeoutMs}ms; terminating`);
          child.kill('SIGKILL');
        }, invocation.timeoutMs);

        child.on('error', error => {
          clearTimeout(timer);
          if (!settled) {
            settled = true;
            reject(error);
          }
        });

        child.on('close', (code, signal) => {
          clearTimeout(timer);
          if (!settled) {
            settled = true;
            resolve({ code, signal, timedOut });
          }
        });
      });
    } finally {
      await stderr.close();
    }
  }
}
