import path from 'path';
import type { PipelineProfile } from '../config';
import { buildSeriesReports } from '../reports/report-builder';
import { aggregateStudyReports } from '../reports/report-aggregator';
import { niftiPath, seriesReportDir, type StudyLayout } from '../study-storage';
import { collectCoreStats } from './corestats';
import type { StepId } from './step-catalog';
import type { NeuroToolkit, SubregionStructure } from './toolkit';

/** Work of one step; per-series steps get a one-element list. */
export type StepAction = (series: readonly string[]) => Promise<void>;

export interface StepContext {
  toolkit: NeuroToolkit;
  layout: StudyLayout;
  profile: PipelineProfile;
  concurrency: number;
}

const subregion = (structure: SubregionStructure, { toolkit, layout }: StepContext): StepAction =>
  async (series) => {
    for (const subjectId of series) {
      await toolkit.segmentSubregions({ structure, subjectId, subjectsDir: layout.freesurfer });
    }
  };

/** Binds every step id to the tool calls and file locations of one study. */
export function createStepActions(context: StepContext): Record<StepId, StepAction> {
  const { toolkit, layout, profile, concurrency } = context;

  return {
    convert: async (series) => {
      for (const name of series) {
        await toolkit.convertToVolume({
          dicomDir: path.join(layout.dicom, name),
          outputDir: layout.nifti,
          outputName: name,
        });
      }
    },

    reconall: async (series) => {
      await toolkit.reconstruct({
        subjects: series.map((name) => ({ subjectId: name, t1File: niftiPath(layout, name) })),
        subjectsDir: layout.freesurfer,
      });
    },

    samseg: async (series) => {
      for (const name of series) {
        await toolkit.segmentLesions({
          inputVolume: path.join(layout.freesurfer, name, 'mri', 'brain.mgz'),
          outputDir: path.join(layout.samseg, name),
        });
      }
    },

    thalamus: subregion('thalamus', context),
    brainstem: subregion('brainstem', context),
    'hippo-amygdala': subregion('hippo-amygdala', context),

    hypothalamus: async (series) => {
      for (const subjectId of series) {
        await toolkit.segmentHypothalamus({ subjectId, subjectsDir: layout.freesurfer, threads: concurrency });
      }
    },

    fastsurfer: async (series) => {
      for (const subjectId of series) {
        await toolkit.runFastSurfer({
          t1File: path.join(layout.freesurfer, subjectId, 'mri', 'T1.mgz'),
          subjectId,
          subjectsDir: layout.fastsurfer,
          threads: concurrency,
        });
      }
    },

    report: async (series) => {
      for (const name of series) {
        await buildSeriesReports({
          subjectDir: path.join(layout.freesurfer, name),
          samsegDir: path.join(layout.samseg, name),
          fastsurferDir: path.join(layout.fastsurfer, name),
          outputDir: seriesReportDir(layout, name),
          profile,
        });
      }
      await aggregateStudyReports(layout.json, series);
    },

    corestats: async (series) => {
      for (const name of series) {
        await collectCoreStats(layout, name, profile);
      }
    },
  };
}
