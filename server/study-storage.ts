import fs from 'fs';
import path from 'path';
import { AVERAGES_KEY } from '@shared/schema';
import type { PipelineProfile } from './config';

/**
 * Study storage layout
 * Every study owns a fixed tree of tool folders:
 * {root}/{patient}/{study}/{DICOM|NIFTI|FREESURFER|SAMSEG|WORKFLOWS|JSON|CORESTATS}/{series}/...
 */

export const UNKNOWN_SERIES = 'UNKNOWN';

const RESERVED_SERIES = new Set([AVERAGES_KEY]);

export const STUDY_FOLDERS = {
  dicom: 'DICOM',
  nifti: 'NIFTI',
  freesurfer: 'FREESURFER',
  samseg: 'SAMSEG',
  workflows: 'WORKFLOWS',
  json: 'JSON',
  corestats: 'CORESTATS',
  fastsurfer: 'FASTSURFER',
} as const;

export type StudyFolder = keyof typeof STUDY_FOLDERS;

export type StudyLayout = Record<StudyFolder, string> & { root: string };

/** Keeps alphanumerics, underscore and dash; strips everything else. */
export const sanitizeId = (value: string | null | undefined): string => {
  if (!value) return '';
  return value.replace(/[^A-Za-z0-9_-]/g, '');
};

/** Series folder name derived from a DICOM SeriesDescription. */
export const seriesIdFromDescription = (description: string | null | undefined): string => {
  const id = sanitizeId((description ?? '').trim().replace(/ /g, '_'));
  if (!id) return UNKNOWN_SERIES;
  return RESERVED_SERIES.has(id) ? `${id}_SERIES` : id;
};

export const studyRoot = (dataRoot: string, patient: string, study: string): string =>
  path.join(dataRoot, sanitizeId(patient), sanitizeId(study));

export function studyLayout(root: string): StudyLayout {
  return {
    root,
    dicom: path.join(root, STUDY_FOLDERS.dicom),
    nifti: path.join(root, STUDY_FOLDERS.nifti),
    freesurfer: path.join(root, STUDY_FOLDERS.freesurfer),
    samseg: path.join(root, STUDY_FOLDERS.samseg),
    workflows: path.join(root, STUDY_FOLDERS.workflows),
    json: path.join(root, STUDY_FOLDERS.json),
    corestats: path.join(root, STUDY_FOLDERS.corestats),
    fastsurfer: path.join(root, STUDY_FOLDERS.fastsurfer),
  };
}

/** Folders a run needs for the given profile. */
export function requiredFolders(profile: PipelineProfile): StudyFolder[] {
  const folders: StudyFolder[] = ['dicom', 'nifti', 'freesurfer', 'samseg', 'workflows', 'json', 'corestats'];
  if (profile.hypothalamusTool === 'fastsurfer') folders.push('fastsurfer');
  return folders;
}

export async function ensureStudyLayout(root: string, profile: PipelineProfile): Promise<StudyLayout> {
  const layout = studyLayout(root);
  for (const folder of requiredFolders(profile)) {
    await fs.promises.mkdir(layout[folder], { recursive: true });
  }
  return layout;
}

/** Names of the immediate subdirectories, sorted; empty when the directory is missing. */
export async function listSubfolders(directory: string): Promise<string[]> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(directory, { withFileTypes: true });
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw err;
  }
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

export const discoverSeries = (layout: StudyLayout): Promise<string[]> => listSubfolders(layout.dicom);

export const niftiPath = (layout: StudyLayout, series: string): string =>
  path.join(layout.nifti, `${series}.nii.gz`);

export const seriesReportDir = (layout: StudyLayout, series: string): string =>
  path.join(layout.json, series);

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.promises.access(target);
    return true;
  } catch {
    return false;
  }
}
