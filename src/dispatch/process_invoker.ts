/**
 * Asynchronous fire-and-forget invocation of a worker payload.
 * The production invoker starts a detached child process per payload.
 */

import { spawn } from 'child_process';
import { createChildLogger } from '@/utils/logger';
import type { WorkerEvent } from '@/types/contracts';

const logger = createChildLogger('process_invoker');

export const WORKER_PAYLOAD_ENV = 'WORKER_PAYLOAD';

export interface WorkerInvoker {
  /** True when the invocation was handed off; the result is never awaited. */
  invoke(event: WorkerEvent): Promise<boolean>;
}

export function splitCommand(command: string): { file: string; args: string[] } {
  const [file, ...args] = command.trim().split(/\s+/);
  return { file, args };
}

export class ProcessWorkerInvoker implements WorkerInvoker {
  constructor(
    private readonly command: string,
    private readonly cwd: string = process.cwd()
  ) {}

  invoke(event: WorkerEvent): Promise<boolean> {
    const { file, args } = splitCommand(this.command);
    const payload = JSON.stringify(event);

    return new Promise((resolve) => {
      const child = spawn(file, args, {
        cwd: this.cwd,
        detached: true,
        stdio: 'ignore',
        env: { ...process.env, [WORKER_PAYLOAD_ENV]: payload },
      });

      child.once('spawn', () => {
        logger.debug({ operation: event.operation, pid: child.pid }, 'Worker launched');
        child.unref();
        resolve(true);
      });
      child.once('error', (error) => {
        logger.error({ operation: event.operation, error: error.message }, 'Worker launch failed');
        resolve(false);
      });
    });
  }
}
