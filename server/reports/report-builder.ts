import fs from 'fs';
import path from 'path';
import {
  reportCategories,
  type CorticalReport,
  type GeneralReport,
  type ReportCategory,
  type SeriesReports,
  type SubcorticalReport,
  type UnilateralVolumeRecord,
} from '@shared/schema';
import type { PipelineProfile } from '../config';
import { forSource } from '../logger';
import {
  HEADER_LINES,
  readBrainVolumes,
  readCerebnetStats,
  readCorticalParcellation,
  readHypothalamicSubunits,
  readHypvinnStats,
  readNameVolumeFile,
  readPairedVolumes,
  readSegmentationStats,
  readStatsRows,
  readThalamicNuclei,
  readWhiteMatterParcels,
  segmentationRows,
} from './stats-reader';

const log = forSource('reports');

export interface SeriesReportInput {
  /** FreeSurfer subject directory of the series (contains mri/ and stats/). */
  subjectDir: string;
  /** SAMSEG output directory of the series. */
  samsegDir: string;
  /** FastSurfer subject directory; read only under the fastsurfer profile. */
  fastsurferDir?: string;
  outputDir: string;
  profile: PipelineProfile;
}

export async function buildSubcortical(input: SeriesReportInput): Promise<SubcorticalReport> {
  const mri = path.join(input.subjectDir, 'mri');
  const [hippocampus, thalamus, amygdala, brainStem] = await Promise.all([
    readPairedVolumes(path.join(mri, 'lh.hippoSfVolumes.txt'), path.join(mri, 'rh.hippoSfVolumes.txt')),
    readThalamicNuclei(path.join(mri, 'ThalamicNuclei.volumes.txt')),
    readPairedVolumes(path.join(mri, 'lh.amygNucVolumes.txt'), path.join(mri, 'rh.amygNucVolumes.txt')),
    readNameVolumeFile(path.join(mri, 'brainstemSsLabels.volumes.txt')),
  ]);

  if (input.profile.hypothalamusTool === 'fastsurfer') {
    const stats = path.join(input.fastsurferDir ?? input.subjectDir, 'stats');
    const [hypothalamus, cerebellum] = await Promise.all([
      readHypvinnStats(path.join(stats, 'hypothalamus.HypVINN.stats')),
      readCerebnetStats(path.join(stats, 'cerebellum.CerebNet.stats')),
    ]);
    return { hippocampus, thalamus, amygdala, brain_stem: brainStem, hypothalamus, cerebellum };
  }

  const hypothalamus = await readHypothalamicSubunits(path.join(mri, 'hypothalamic_subunits_volumes.v1.csv'));
  return { hippocampus, thalamus, amygdala, brain_stem: brainStem, hypothalamus };
}

export async function buildCortical(input: SeriesReportInput): Promise<CorticalReport> {
  const stats = path.join(input.subjectDir, 'stats');
  const [brain, whitematter, lhDkt, rhDkt] = await Promise.all([
    readBrainVolumes(path.join(stats, 'brainvol.stats')),
    readWhiteMatterParcels(path.join(stats, 'wmparc.stats')),
    readCorticalParcellation(path.join(stats, 'lh.aparc.DKTatlas.stats')),
    readCorticalParcellation(path.join(stats, 'rh.aparc.DKTatlas.stats')),
  ]);
  return { brain, whitematter, lh_dkatlas: lhDkt, rh_dkatlas: rhDkt };
}

export async function buildGeneral(input: SeriesReportInput): Promise<GeneralReport> {
  const aseg = await readSegmentationStats(path.join(input.subjectDir, 'stats', 'aseg.stats'), HEADER_LINES.aseg);
  const hypointensities = aseg.filter((record) => record.Structure.includes('hypointensities'));
  const regular = aseg.filter((record) => !record.Structure.includes('hypointensities'));

  let lesions: UnilateralVolumeRecord[] = [];
  if (input.profile.lesionSegmentation) {
    const samsegFile = path.join(input.samsegDir, 'samseg.fs.stats');
    lesions = segmentationRows(await readStatsRows(samsegFile), path.basename(samsegFile))
      .filter((record) => record.Structure.includes('Lesions'));
  }

  return { aseg: regular, lesions: [...hypointensities, ...lesions] };
}

export async function writeJsonDocument(filePath: string, document: unknown): Promise<void> {
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, JSON.stringify(document, null, 4), 'utf-8');
}

export const reportFileName = (category: ReportCategory): string => `${category}.json`;

/**
 * Parses one completed series' stats files into the three report documents and
 * writes them to `outputDir`, replacing any earlier files.
 */
export async function buildSeriesReports(input: SeriesReportInput): Promise<SeriesReports> {
  const [subcortical, cortical, general] = await Promise.all([
    buildSubcortical(input),
    buildCortical(input),
    buildGeneral(input),
  ]);
  const reports: SeriesReports = { subcortical, cortical, general };

  await fs.promises.mkdir(input.outputDir, { recursive: true });
  for (const category of reportCategories) {
    const target = path.join(input.outputDir, reportFileName(category));
    await writeJsonDocument(target, reports[category]);
    log.info(`Wrote ${reportFileName(category)} to ${target}`);
  }
  return reports;
}
