import type { PipelineStage } from '@shared/schema';
import { StageFailedError, errorMessage } from '../errors';
import { forSource } from '../logger';
import { pathExists, type StudyLayout } from '../study-storage';
import { STEP_OUTPUTS, expectedOutputs, type StepId } from './step-catalog';

const log = forSource('step-runner');

export type StepState = 'pending' | 'skipped' | 'running' | 'done' | 'failed';

export interface StepRecord {
  step: StepId;
  stage: PipelineStage;
  series: string;
  state: StepState;
  error?: string;
  updatedAt: string;
}

const NEXT_STATES: Record<StepState, readonly StepState[]> = {
  pending: ['skipped', 'running'],
  running: ['done', 'failed'],
  skipped: [],
  done: [],
  failed: [],
};

/** Per (step, series) state of one run. */
export class StepLedger {
  private readonly records = new Map<string, StepRecord>();

  private key(step: StepId, series: string) {
    return `${step}:${series}`;
  }

  get(step: StepId, series: string): StepRecord | undefined {
    return this.records.get(this.key(step, series));
  }

  transition(stage: PipelineStage, step: StepId, series: string, state: StepState, error?: string): void {
    const current = this.get(step, series)?.state ?? 'pending';
    if (current !== 'pending' || state !== 'pending') {
      if (!NEXT_STATES[current].includes(state)) {
        throw new Error(`Illegal step transition ${current} -> ${state} for ${step}:${series}`);
      }
    }
    this.records.set(this.key(step, series), { step, stage, series, state, error, updatedAt: new Date().toISOString() });
  }

  snapshot(): StepRecord[] {
    return [...this.records.values()];
  }
}

/**
 * Wraps each external step with an output-existence check, state tracking and
 * failure logging. It never decides to halt the run; failures are rethrown as
 * StageFailedError for the orchestrator.
 */
export class StepRunner {
  constructor(
    private readonly layout: StudyLayout,
    readonly ledger: StepLedger = new StepLedger(),
  ) {}

  /** True when the step declares outputs and every one exists for the series. */
  async isComplete(step: StepId, series: string): Promise<boolean> {
    if (STEP_OUTPUTS[step].length === 0) return false;
    const files = expectedOutputs(step, this.layout, series);
    const present = await Promise.all(files.map(pathExists));
    return present.every(Boolean);
  }

  async runForSeries(stage: PipelineStage, step: StepId, series: string, invoke: () => Promise<void>): Promise<StepState> {
    this.ledger.transition(stage, step, series, 'pending');
    if (await this.isComplete(step, series)) {
      log.info(`Skipping ${step} for ${series}: outputs already exist`);
      this.ledger.transition(stage, step, series, 'skipped');
      return 'skipped';
    }

    this.ledger.transition(stage, step, series, 'running');
    try {
      await invoke();
    } catch (error) {
      log.error(`Step ${step} (${stage}) failed for series ${series}: ${errorMessage(error)}`);
      this.ledger.transition(stage, step, series, 'failed', errorMessage(error));
      throw new StageFailedError(stage, step, series, error);
    }
    this.ledger.transition(stage, step, series, 'done');
    log.info(`Step ${step} completed for ${series}`);
    return 'done';
  }

  /**
   * Invokes `invoke` once with the series whose outputs are incomplete, or not
   * at all when every series is complete. Steps without declared outputs are
   * always invoked with the full list.
   */
  async runBatch(
    stage: PipelineStage,
    step: StepId,
    series: readonly string[],
    invoke: (pending: readonly string[]) => Promise<void>,
  ): Promise<string[]> {
    const pending: string[] = [];
    for (const name of series) {
      this.ledger.transition(stage, step, name, 'pending');
      if (await this.isComplete(step, name)) {
        log.info(`Skipping ${step} for ${name}: outputs already exist`);
        this.ledger.transition(stage, step, name, 'skipped');
      } else {
        pending.push(name);
      }
    }

    const hasOutputs = STEP_OUTPUTS[step].length > 0;
    if (hasOutputs && pending.length === 0) {
      log.info(`All series already processed by ${step}; nothing to do`);
      return pending;
    }

    pending.forEach((name) => this.ledger.transition(stage, step, name, 'running'));
    try {
      await invoke(pending);
    } catch (error) {
      log.error(`Step ${step} (${stage}) failed for series [${pending.join(', ')}]: ${errorMessage(error)}`);
      pending.forEach((name) => this.ledger.transition(stage, step, name, 'failed', errorMessage(error)));
      throw new StageFailedError(stage, step, null, error);
    }
    pending.forEach((name) => this.ledger.transition(stage, step, name, 'done'));
    log.info(`Step ${step} completed for [${pending.join(', ')}]`);
    return pending;
  }
}
