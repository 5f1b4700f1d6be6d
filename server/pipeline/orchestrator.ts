import type { PipelineStage } from '@shared/schema';
import type { PipelineProfile } from '../config';
import { saveDicoms, type UploadedDicom } from '../dicom-intake';
import { StageFailedError, errorMessage } from '../errors';
import { forSource } from '../logger';
import { discoverSeries, ensureStudyLayout } from '../study-storage';
import type { ProgressChannel } from './progress-channel';
import type { RunGuard } from './run-guard';
import { buildStagePlan, type StagePlan, type StepId } from './step-catalog';
import { StepRunner, type StepRecord } from './step-runner';
import { createStepActions, type StepAction } from './steps';
import type { NeuroToolkit } from './toolkit';
import { forEachBounded } from './worker-pool';

const log = forSource('pipeline');

export interface OrchestratorDeps {
  guard: RunGuard;
  channel: ProgressChannel;
  toolkit: NeuroToolkit;
  profile: PipelineProfile;
  concurrency: number;
}

export interface RunInput {
  studyRoot: string;
  files: readonly UploadedDicom[];
}

export type RunOutcome =
  | { status: 'completed'; series: string[]; steps: StepRecord[] }
  | { status: 'failed'; stage: PipelineStage; message: string; steps: StepRecord[] };

/**
 * Drives one study through the fixed stage chain. The caller acquires the run
 * guard; `run` always releases it and reports progress on the channel.
 */
export class PipelineOrchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async run({ studyRoot, files }: RunInput): Promise<RunOutcome> {
    const { guard, channel, profile } = this.deps;
    let runner: StepRunner | null = null;
    let stage: PipelineStage = 'dicom';
    const startedAt = Date.now();

    try {
      const layout = await ensureStudyLayout(studyRoot, profile);
      runner = new StepRunner(layout);

      await saveDicoms(files, layout);
      channel.completed('dicom');

      const series = await discoverSeries(layout);
      if (series.length === 0) {
        log.warn(`No series found under ${layout.dicom}; continuing with an empty study`);
      } else {
        log.info(`Discovered series: ${series.join(', ')}`);
      }

      const actions = createStepActions({
        toolkit: this.deps.toolkit,
        layout,
        profile,
        concurrency: this.deps.concurrency,
      });

      for (const plan of buildStagePlan(profile)) {
        stage = plan.stage;
        await this.runStage(plan, series, runner, actions);
        channel.completed(plan.stage);
        log.info(`Stage ${plan.stage} completed`);
      }

      log.info(`Pipeline finished for ${studyRoot} in ${((Date.now() - startedAt) / 1000).toFixed(1)}s`);
      return { status: 'completed', series, steps: runner.ledger.snapshot() };
    } catch (error) {
      const failedStage = error instanceof StageFailedError ? error.stage : stage;
      log.error(`Pipeline stopped at stage ${failedStage}: ${errorMessage(error)}`);
      channel.failed(failedStage);
      return { status: 'failed', stage: failedStage, message: errorMessage(error), steps: runner?.ledger.snapshot() ?? [] };
    } finally {
      guard.release();
    }
  }

  private async runStage(
    plan: StagePlan,
    series: readonly string[],
    runner: StepRunner,
    actions: Record<StepId, StepAction>,
  ): Promise<void> {
    if (plan.mode === 'batch') {
      for (const step of plan.steps) {
        await runner.runBatch(plan.stage, step, series, (pending) => actions[step](pending));
      }
      return;
    }

    await forEachBounded(series, this.deps.concurrency, async (name) => {
      for (const step of plan.steps) {
        await runner.runForSeries(plan.stage, step, name, () => actions[step]([name]));
      }
    });
  }
}
