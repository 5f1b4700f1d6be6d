import type { PipelineStage } from '@shared/schema';

/** An expected input file is absent. */
export class NotFoundError extends Error {
  readonly path: string;

  constructor(path: string, what = 'File') {
    super(`${what} not found: ${path}`);
    this.name = 'NotFoundError';
    this.path = path;
  }
}

/** A volume file exists but its header cannot be read. */
export class InvalidVolumeError extends Error {
  constructor(path: string, reason: string) {
    super(`Invalid volume ${path}: ${reason}`);
    this.name = 'InvalidVolumeError';
  }
}

/** Request input rejected before any pipeline state is touched. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Another run holds the run guard. */
export class RunBusyError extends Error {
  constructor() {
    super('A pipeline run is already in progress');
    this.name = 'RunBusyError';
  }
}

export class UploadTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Upload did not complete within ${timeoutMs} ms`);
    this.name = 'UploadTimeoutError';
  }
}

export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(command: string, exitCode: number | null, stderr: string) {
    const detail = stderr.trim().split('\n').slice(-5).join('\n');
    super(`${command} exited with ${exitCode ?? 'signal'}${detail ? `: ${detail}` : ''}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class StageFailedError extends Error {
  readonly stage: PipelineStage;
  readonly step: string;
  readonly series: string | null;

  constructor(stage: PipelineStage, step: string, series: string | null, cause: unknown) {
    const scope = series ? ` for series ${series}` : '';
    super(`Step ${step} (${stage}) failed${scope}: ${errorMessage(cause)}`, { cause });
    this.name = 'StageFailedError';
    this.stage = stage;
    this.step = step;
    this.series = series;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFound(error: unknown): boolean {
  if (error instanceof NotFoundError) return true;
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
