/**
 * Shared test fixtures: temporary study trees, FreeSurfer-style stats files and
 * a recording stand-in for the external tools.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import type { PipelineProfile } from '../config';
import { STEP_OUTPUTS, type StepId } from '../pipeline/step-catalog';
import type {
  ConvertRequest,
  FastSurferRequest,
  HypothalamusRequest,
  LesionRequest,
  NeuroToolkit,
  ReconRequest,
  SubregionRequest,
  SubregionStructure,
} from '../pipeline/toolkit';
import { studyLayout, type StudyLayout } from '../study-storage';

export async function makeTempDir(prefix = 'neurostats-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}

export async function writeText(filePath: string, content: string): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

export async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
}

/** `count` comment lines standing in for a stats file preamble. */
export const header = (count: number): string[] =>
  Array.from({ length: count }, (_, i) => `# header line ${i + 1}`);

export const lines = (...rows: string[]): string => `${rows.join('\n')}\n`;

/** What recon-all leaves under stats/. */
export async function writeReconStats(layout: StudyLayout, series: string): Promise<void> {
  const stats = path.join(layout.freesurfer, series, 'stats');
  await writeText(
    path.join(stats, 'brainvol.stats'),
    lines(
      '# Measure BrainSeg, BrainSegVol, Brain Segmentation Volume, 1000123.7, mm^3',
      '# Measure BrainSegNotVent, BrainSegVolNotVent, Brain Segmentation Volume Without Ventricles, 980000.2, mm^3',
    ),
  );
  await writeText(
    path.join(stats, 'wmparc.stats'),
    lines(
      ...header(66),
      '1 3001 1200 1234.5 wm-lh-bankssts 0 0 0 0 0',
      '2 4001 1100 1100.25 wm-rh-bankssts 0 0 0 0 0',
      '3 5001 20000 20000 Left-UnsegmentedWhiteMatter 0 0 0 0 0',
    ),
  );
  await writeText(
    path.join(stats, 'lh.aparc.DKTatlas.stats'),
    lines(...header(61), 'caudalanteriorcingulate 1024 700 2100 2.651 0.612 0.125 5 1.9'),
  );
  await writeText(
    path.join(stats, 'rh.aparc.DKTatlas.stats'),
    lines(...header(61), 'caudalanteriorcingulate 1000 680 2000 2.5 0.6 0.13 5 1.8'),
  );
  await writeText(
    path.join(stats, 'aseg.stats'),
    lines(
      ...header(80),
      '1 4 5000 5123.4 Left-Lateral-Ventricle 0 0 0 0 0',
      '2 77 300 310.75 WM-hypointensities 0 0 0 0 0',
      '3 17 4000 4100 Left-Hippocampus 0 0 0 0 0',
    ),
  );
}

export async function writeLesionStats(layout: StudyLayout, series: string): Promise<void> {
  await writeText(
    path.join(layout.samseg, series, 'samseg.fs.stats'),
    lines('1 99 50 55.5 Lesions 0', '2 2 1000 1000 Left-Cerebral-White-Matter 0'),
  );
}

export async function writeSubregionStats(layout: StudyLayout, series: string, structure: SubregionStructure): Promise<void> {
  const mri = path.join(layout.freesurfer, series, 'mri');
  switch (structure) {
    case 'thalamus':
      await writeText(path.join(mri, 'ThalamicNuclei.volumes.txt'), lines('Left-LGN 200.5', 'Right-LGN 190.25', 'Left-MGN 100'));
      break;
    case 'brainstem':
      await writeText(path.join(mri, 'brainstemSsLabels.volumes.txt'), lines('Medulla 4500.5', 'Pons 15000'));
      break;
    case 'hippo-amygdala':
      await writeText(path.join(mri, 'lh.hippoSfVolumes.txt'), lines('CA1 105.123', 'subiculum 210.5'));
      await writeText(path.join(mri, 'rh.hippoSfVolumes.txt'), lines('CA1 110', 'subiculum 200.25'));
      await writeText(path.join(mri, 'lh.amygNucVolumes.txt'), lines('Lateral-nucleus 600'));
      await writeText(path.join(mri, 'rh.amygNucVolumes.txt'), lines('Lateral-nucleus 620.5'));
      break;
  }
}

export async function writeHypothalamusStats(layout: StudyLayout, series: string): Promise<void> {
  await writeText(
    path.join(layout.freesurfer, series, 'mri', 'hypothalamic_subunits_volumes.v1.csv'),
    lines('subject,left anterior,right anterior,whole left,whole right', `${series},10.5,11.25,400,410`),
  );
}

/**
 * Writes every file the report builder reads for one series. The expected
 * documents are spelled out in report-builder.test.ts.
 */
export async function writeSubjectStats(layout: StudyLayout, series: string): Promise<void> {
  await writeReconStats(layout, series);
  await writeLesionStats(layout, series);
  for (const structure of ['thalamus', 'brainstem', 'hippo-amygdala'] as const) {
    await writeSubregionStats(layout, series, structure);
  }
  await writeHypothalamusStats(layout, series);
}

/** Creates empty placeholders for the idempotency files a step declares; existing files are kept. */
export async function touchOutputs(layout: StudyLayout, step: StepId, series: string): Promise<void> {
  for (const template of STEP_OUTPUTS[step]) {
    const target = path.join(layout[template.folder], template.path.split('{series}').join(series));
    if (!fs.existsSync(target)) await writeText(target, '');
  }
}

export type ToolCall =
  | { method: 'convertToVolume'; request: ConvertRequest }
  | { method: 'reconstruct'; request: ReconRequest }
  | { method: 'segmentLesions'; request: LesionRequest }
  | { method: 'segmentSubregions'; request: SubregionRequest }
  | { method: 'segmentHypothalamus'; request: HypothalamusRequest }
  | { method: 'runFastSurfer'; request: FastSurferRequest };

export type ToolMethod = ToolCall['method'];

/**
 * Toolkit stand-in that records each call. Given a layout it leaves the files
 * a real tool would, so later stages and re-runs see them. `failOn` makes
 * chosen calls reject.
 */
export class RecordingToolkit implements NeuroToolkit {
  readonly calls: ToolCall[] = [];
  failOn: ((call: ToolCall) => boolean) | null = null;

  constructor(private readonly layout: StudyLayout | null = null) {}

  methods(): ToolMethod[] {
    return this.calls.map((call) => call.method);
  }

  private async record(
    call: ToolCall,
    step: StepId,
    series: readonly string[],
    produce?: (layout: StudyLayout, series: string) => Promise<void>,
  ): Promise<void> {
    this.calls.push(call);
    if (this.failOn?.(call)) {
      throw new Error(`${call.method} failed`);
    }
    if (!this.layout) return;
    for (const name of series) {
      await produce?.(this.layout, name);
      await touchOutputs(this.layout, step, name);
    }
  }

  async convertToVolume(request: ConvertRequest): Promise<void> {
    await this.record({ method: 'convertToVolume', request }, 'convert', [request.outputName]);
  }

  async reconstruct(request: ReconRequest): Promise<void> {
    const subjects = request.subjects.map((subject) => subject.subjectId);
    await this.record({ method: 'reconstruct', request }, 'reconall', subjects, writeReconStats);
  }

  async segmentLesions(request: LesionRequest): Promise<void> {
    await this.record({ method: 'segmentLesions', request }, 'samseg', [path.basename(request.outputDir)], writeLesionStats);
  }

  async segmentSubregions(request: SubregionRequest): Promise<void> {
    await this.record({ method: 'segmentSubregions', request }, request.structure, [request.subjectId], (layout, series) =>
      writeSubregionStats(layout, series, request.structure),
    );
  }

  async segmentHypothalamus(request: HypothalamusRequest): Promise<void> {
    await this.record({ method: 'segmentHypothalamus', request }, 'hypothalamus', [request.subjectId], writeHypothalamusStats);
  }

  async runFastSurfer(request: FastSurferRequest): Promise<void> {
    await this.record({ method: 'runFastSurfer', request }, 'fastsurfer', [request.subjectId]);
  }
}

export const FREESURFER_PROFILE: PipelineProfile = { lesionSegmentation: true, hypothalamusTool: 'freesurfer' };

/** A study tree with the given series already present under DICOM/. */
export async function makeStudy(root: string, series: string[]): Promise<StudyLayout> {
  const layout = studyLayout(root);
  for (const name of series) {
    await writeText(path.join(layout.dicom, name, 'IM0001.dcm'), 'placeholder');
  }
  return layout;
}
