import path from 'path';
import type { PipelineStage } from '@shared/schema';
import type { PipelineProfile } from '../config';
import type { StudyFolder, StudyLayout } from '../study-storage';

export type StepId =
  | 'convert'
  | 'reconall'
  | 'samseg'
  | 'thalamus'
  | 'brainstem'
  | 'hippo-amygdala'
  | 'hypothalamus'
  | 'fastsurfer'
  | 'report'
  | 'corestats';

/** A file a step leaves behind, relative to a study folder; `{series}` is substituted. */
export interface OutputTemplate {
  folder: StudyFolder;
  path: string;
}

const out = (folder: StudyFolder, ...segments: string[]): OutputTemplate => ({ folder, path: path.join(...segments) });

/**
 * Files whose joint presence marks a step as already done for a series. An
 * empty list means the step always runs.
 */
export const STEP_OUTPUTS: Record<StepId, readonly OutputTemplate[]> = {
  convert: [out('nifti', '{series}.nii.gz')],
  reconall: [
    out('freesurfer', '{series}', 'surf', 'lh.white'),
    out('freesurfer', '{series}', 'surf', 'rh.white'),
    out('freesurfer', '{series}', 'stats', 'lh.aparc.stats'),
    out('freesurfer', '{series}', 'stats', 'rh.aparc.stats'),
    out('freesurfer', '{series}', 'mri', 'aparc+aseg.mgz'),
  ],
  samseg: [out('samseg', '{series}', 'samseg.stats')],
  thalamus: [
    out('freesurfer', '{series}', 'mri', 'ThalamicNuclei.mgz'),
    out('freesurfer', '{series}', 'mri', 'ThalamicNuclei.volumes.txt'),
  ],
  brainstem: [
    out('freesurfer', '{series}', 'mri', 'brainstemSsLabels.mgz'),
    out('freesurfer', '{series}', 'mri', 'brainstemSsLabels.volumes.txt'),
  ],
  'hippo-amygdala': [
    out('freesurfer', '{series}', 'mri', 'rh.amygNucVolumes.txt'),
    out('freesurfer', '{series}', 'mri', 'rh.hippoSfVolumes.txt'),
    out('freesurfer', '{series}', 'mri', 'lh.amygNucVolumes.txt'),
    out('freesurfer', '{series}', 'mri', 'lh.hippoSfVolumes.txt'),
    out('freesurfer', '{series}', 'mri', 'lh.hippoAmygLabels.mgz'),
    out('freesurfer', '{series}', 'mri', 'rh.hippoAmygLabels.mgz'),
  ],
  hypothalamus: [out('freesurfer', '{series}', 'mri', 'hypothalamic_subunits_volumes.v1.csv')],
  fastsurfer: [
    out('fastsurfer', '{series}', 'mri', 'cerebellum.CerebNet.nii.gz'),
    out('fastsurfer', '{series}', 'mri', 'hypothalamus.HypVINN.nii.gz'),
    out('fastsurfer', '{series}', 'mri', 'hypothalamus_mask.HypVINN.nii.gz'),
    out('fastsurfer', '{series}', 'stats', 'cerebellum.CerebNet.stats'),
    out('fastsurfer', '{series}', 'stats', 'hypothalamus.HypVINN.stats'),
  ],
  report: [],
  corestats: [],
};

export function expectedOutputs(step: StepId, layout: StudyLayout, series: string): string[] {
  return STEP_OUTPUTS[step].map((template) =>
    path.join(layout[template.folder], template.path.split('{series}').join(series)),
  );
}

/**
 * One stage of the run. `series` stages fan out over the series with the
 * worker pool and run their steps in order within each series; `batch`
 * stages run their steps once over the whole series list.
 */
export interface StagePlan {
  stage: PipelineStage;
  mode: 'series' | 'batch';
  steps: readonly StepId[];
}

/** Stages after DICOM intake, in dependency order. */
export function buildStagePlan(profile: PipelineProfile): StagePlan[] {
  const plan: StagePlan[] = [
    { stage: 'nifti', mode: 'series', steps: ['convert'] },
    { stage: 'recon', mode: 'batch', steps: ['reconall'] },
  ];
  if (profile.lesionSegmentation) {
    plan.push({ stage: 'lesions', mode: 'series', steps: ['samseg'] });
  }
  plan.push(
    { stage: 'subs', mode: 'series', steps: ['thalamus', 'brainstem', 'hippo-amygdala'] },
    { stage: 'hyp', mode: 'series', steps: [profile.hypothalamusTool === 'fastsurfer' ? 'fastsurfer' : 'hypothalamus'] },
    { stage: 'json', mode: 'batch', steps: ['report'] },
    { stage: 'corestats', mode: 'series', steps: ['corestats'] },
  );
  return plan;
}
