import os from 'os';
import path from 'path';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().optional(),
  DATA_ROOT: z.string().default('./DATA'),
  UPLOAD_DIR: z.string().default('./uploads'),
  STREAM_HEARTBEAT_MS: z.coerce.number().int().positive().default(10_000),
  UPLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().optional(),
  LESION_SEGMENTATION: booleanFlag.default('true'),
  HYPOTHALAMUS_TOOL: z.enum(['freesurfer', 'fastsurfer']).default('freesurfer'),
  FASTSURFER_HOME: z.string().default(path.join(os.homedir(), 'FastSurfer')),
  DCM2NIIX_BIN: z.string().default('dcm2niix'),
  RECON_ALL_BIN: z.string().default('recon-all'),
  SAMSEG_BIN: z.string().default('run_samseg'),
  SEGMENT_SUBREGIONS_BIN: z.string().default('segment_subregions'),
  HYPOTHALAMUS_BIN: z.string().default('mri_segment_hypothalamic_subunits'),
});

export type HypothalamusTool = 'freesurfer' | 'fastsurfer';

/** Which optional branches of the pipeline are active. */
export interface PipelineProfile {
  lesionSegmentation: boolean;
  hypothalamusTool: HypothalamusTool;
}

export interface ToolCommands {
  dcm2niix: string;
  reconAll: string;
  samseg: string;
  segmentSubregions: string;
  hypothalamus: string;
  fastsurferHome: string;
}

export interface AppConfig {
  port?: number;
  dataRoot: string;
  uploadDir: string;
  heartbeatMs: number;
  uploadTimeoutMs: number;
  concurrency: number;
  profile: PipelineProfile;
  tools: ToolCommands;
}

export const DEFAULT_PROFILE: PipelineProfile = {
  lesionSegmentation: true,
  hypothalamusTool: 'freesurfer',
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }
  const vars = parsed.data;
  return {
    port: vars.PORT,
    dataRoot: path.resolve(vars.DATA_ROOT),
    uploadDir: path.resolve(vars.UPLOAD_DIR),
    heartbeatMs: vars.STREAM_HEARTBEAT_MS,
    uploadTimeoutMs: vars.UPLOAD_TIMEOUT_MS,
    concurrency: vars.WORKER_CONCURRENCY ?? Math.max(1, os.availableParallelism()),
    profile: {
      lesionSegmentation: vars.LESION_SEGMENTATION,
      hypothalamusTool: vars.HYPOTHALAMUS_TOOL,
    },
    tools: {
      dcm2niix: vars.DCM2NIIX_BIN,
      reconAll: vars.RECON_ALL_BIN,
      samseg: vars.SAMSEG_BIN,
      segmentSubregions: vars.SEGMENT_SUBREGIONS_BIN,
      hypothalamus: vars.HYPOTHALAMUS_BIN,
      fastsurferHome: vars.FASTSURFER_HOME,
    },
  };
}
