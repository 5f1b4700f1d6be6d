import { z } from "zod";

// Field names as they appear in the JSON report documents.
export const STRUCTURE_KEY = "Structure";
export const VOLUME_KEY = "Volume (mm3)";
export const LHS_VOLUME_KEY = "LHS Volume (mm3)";
export const RHS_VOLUME_KEY = "RHS Volume (mm3)";

export const AVERAGES_KEY = "AVERAGES";

export const reportCategories = ["subcortical", "cortical", "general"] as const;
export const reportCategorySchema = z.enum(reportCategories);
export type ReportCategory = z.infer<typeof reportCategorySchema>;

export interface UnilateralVolumeRecord {
  [STRUCTURE_KEY]: string;
  [VOLUME_KEY]: number;
}

export interface BilateralVolumeRecord {
  [STRUCTURE_KEY]: string;
  [LHS_VOLUME_KEY]: number | null;
  [RHS_VOLUME_KEY]: number | null;
}

export interface ParcellationRecord {
  [STRUCTURE_KEY]: string;
  "Surface Area (mm2)": number;
  "Gray Matter Vol (mm3)": number;
  "Thickness Avg (mm)": number;
  "Mean Curvature (mm-1)": number;
}

export interface SubcorticalReport {
  hippocampus: BilateralVolumeRecord[];
  thalamus: BilateralVolumeRecord[];
  amygdala: BilateralVolumeRecord[];
  brain_stem: UnilateralVolumeRecord[];
  hypothalamus: Array<BilateralVolumeRecord | UnilateralVolumeRecord>;
  cerebellum?: UnilateralVolumeRecord[];
}

export interface CorticalReport {
  brain: UnilateralVolumeRecord[];
  whitematter: BilateralVolumeRecord[];
  lh_dkatlas: ParcellationRecord[];
  rh_dkatlas: ParcellationRecord[];
}

export interface GeneralReport {
  aseg: UnilateralVolumeRecord[];
  lesions: UnilateralVolumeRecord[];
}

export interface SeriesReports {
  subcortical: SubcorticalReport;
  cortical: CorticalReport;
  general: GeneralReport;
}

/**
 * Loose shape of any report document read back from disk: sub-key to a list
 * of flat records. Used by the aggregator, which must not trust the files.
 */
export const reportEntrySchema = z.record(z.string(), z.unknown());
export const reportDocumentSchema = z.record(z.string(), z.array(reportEntrySchema));
export type ReportDocument = z.infer<typeof reportDocumentSchema>;

export type AveragedRecord = Record<string, string | number>;
export type AveragedDocument = Record<string, AveragedRecord[]>;

/** Series name (or AVERAGES) to that scope's full document. */
export type GlobalDocument = Record<string, ReportDocument>;

// Pipeline stages as reported on the progress stream, in run order.
export const pipelineStages = ["dicom", "nifti", "recon", "lesions", "subs", "hyp", "json", "corestats"] as const;
export const pipelineStageSchema = z.enum(pipelineStages);
export type PipelineStage = z.infer<typeof pipelineStageSchema>;

export const progressEventSchema = z.object({
  tag: z.string(),
  step: pipelineStageSchema,
  status: z.enum(["completed", "failed"]),
  at: z.string(),
});
export type ProgressEvent = z.infer<typeof progressEventSchema>;

export const runRequestSchema = z.object({
  patient: z.string().trim().min(1, "patient is required"),
  study: z.string().trim().min(1, "study is required"),
});

export type SeriesDimensions = Record<string, number[] | null>;
