import type { ProcessType } from './process-type.js';

export interface LaunchTarget {
  readonly processType: ProcessType;
  readonly command: string;
  readonly args: readonly string[];
  readonly description: string;
}

/**
 * The two programs a deployment can become. Arguments are fixed.
 */
export const LAUNCH_TARGETS = {
  web: {
    processType: 'web',
    command: 'uvicorn',
    args: ['main:app', '--host', '0.0.0.0', '--port', '8000'],
    description: 'ASGI web server',
  },
  worker: {
    processType: 'worker',
    command: 'celery',
    args: ['-A', 'celery_app.celery', 'worker', '--loglevel=info', '--pool=solo'],
    description: 'Task-queue worker',
  },
} as const satisfies Readonly<Record<ProcessType, LaunchTarget>>;

export function formatCommandLine(target: LaunchTarget): string {
  return [target.command, ...target.args].join(' ');
}
