import path from 'path';
import type { ToolCommands } from '../config';
import { spawnCommand, type CommandRunner } from './command-runner';
import { forEachBounded } from './worker-pool';

export type SubregionStructure = 'thalamus' | 'brainstem' | 'hippo-amygdala';

export interface ConvertRequest {
  dicomDir: string;
  outputDir: string;
  /** Output file name without extension; the tool writes `<name>.nii.gz`. */
  outputName: string;
}

export interface ReconSubject {
  subjectId: string;
  t1File: string;
}

export interface ReconRequest {
  subjects: readonly ReconSubject[];
  subjectsDir: string;
}

export interface LesionRequest {
  inputVolume: string;
  outputDir: string;
}

export interface SubregionRequest {
  structure: SubregionStructure;
  subjectId: string;
  subjectsDir: string;
}

export interface HypothalamusRequest {
  subjectId: string;
  subjectsDir: string;
  threads: number;
}

export interface FastSurferRequest {
  t1File: string;
  subjectId: string;
  subjectsDir: string;
  threads: number;
}

/**
 * The external neuroimaging tools as typed capabilities. Each call resolves
 * when the tool exits successfully and rejects otherwise; outputs are read
 * from the filesystem by later steps.
 */
export interface NeuroToolkit {
  convertToVolume(request: ConvertRequest): Promise<void>;
  reconstruct(request: ReconRequest): Promise<void>;
  segmentLesions(request: LesionRequest): Promise<void>;
  segmentSubregions(request: SubregionRequest): Promise<void>;
  segmentHypothalamus(request: HypothalamusRequest): Promise<void>;
  runFastSurfer(request: FastSurferRequest): Promise<void>;
}

/** Toolkit backed by the FreeSurfer / dcm2niix / FastSurfer command lines. */
export class CommandLineToolkit implements NeuroToolkit {
  constructor(
    private readonly commands: ToolCommands,
    private readonly concurrency: number,
    private readonly run: CommandRunner = spawnCommand,
  ) {}

  async convertToVolume({ dicomDir, outputDir, outputName }: ConvertRequest): Promise<void> {
    await this.run(this.commands.dcm2niix, ['-z', 'y', '-f', outputName, '-o', outputDir, dicomDir]);
  }

  async reconstruct({ subjects, subjectsDir }: ReconRequest): Promise<void> {
    await forEachBounded(subjects, this.concurrency, async ({ subjectId, t1File }) => {
      await this.run(this.commands.reconAll, ['-s', subjectId, '-i', t1File, '-all', '-qcache', '-sd', subjectsDir]);
    });
  }

  async segmentLesions({ inputVolume, outputDir }: LesionRequest): Promise<void> {
    await this.run(this.commands.samseg, ['--input', inputVolume, '--output', outputDir, '--lesion']);
  }

  async segmentSubregions({ structure, subjectId, subjectsDir }: SubregionRequest): Promise<void> {
    await this.run(this.commands.segmentSubregions, [structure, '--cross', subjectId, '--sd', subjectsDir]);
  }

  async segmentHypothalamus({ subjectId, subjectsDir, threads }: HypothalamusRequest): Promise<void> {
    await this.run(this.commands.hypothalamus, ['--s', subjectId, '--sd', subjectsDir, '--threads', String(threads)]);
  }

  async runFastSurfer({ t1File, subjectId, subjectsDir, threads }: FastSurferRequest): Promise<void> {
    const script = path.join(this.commands.fastsurferHome, 'run_fastsurfer.sh');
    await this.run(script, ['--t1', t1File, '--sid', subjectId, '--sd', subjectsDir, '--threads', String(threads)], {
      env: process.platform === 'darwin' ? { PYTORCH_ENABLE_MPS_FALLBACK: '1' } : undefined,
    });
  }
}
