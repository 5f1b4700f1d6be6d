import fs from 'fs';
import path from 'path';
import dicomParser from 'dicom-parser';
import { errorMessage } from './errors';
import { forSource } from './logger';
import { seriesIdFromDescription, type StudyLayout } from './study-storage';

const log = forSource('intake');

// Media Storage Directory Storage
const DICOMDIR_SOP_CLASS = '1.2.840.10008.1.3.10';

/** An upload already written to disk by multer. */
export interface UploadedDicom {
  originalName: string;
  path: string;
}

export interface IntakeSummary {
  saved: number;
  skipped: number;
  series: string[];
}

export const withDcmExtension = (filename: string): string =>
  filename.toLowerCase().endsWith('.dcm') ? filename : `${filename}.dcm`;

const isDicomdirName = (filename: string): boolean => filename.toUpperCase().includes('DICOMDIR');

function readHeader(buffer: Buffer): { seriesDescription?: string; sopClassUid?: string } {
  const dataSet = dicomParser.parseDicom(new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength), {
    untilTag: 'x7fe00010',
  });
  return {
    seriesDescription: dataSet.string('x0008103e'),
    sopClassUid: dataSet.string('x00080016'),
  };
}

/**
 * Sorts uploaded files into DICOM/{series}/ by SeriesDescription. DICOMDIR
 * indexes and files that do not parse are skipped with a log line.
 */
export async function saveDicoms(files: readonly UploadedDicom[], layout: StudyLayout): Promise<IntakeSummary> {
  const series = new Set<string>();
  let saved = 0;
  let skipped = 0;

  for (const file of files) {
    const name = path.basename(file.originalName);
    if (isDicomdirName(name)) {
      log.info(`Skipping directory index ${name}`);
      skipped++;
      continue;
    }

    try {
      const header = readHeader(await fs.promises.readFile(file.path));
      if (header.sopClassUid?.trim() === DICOMDIR_SOP_CLASS) {
        log.info(`Skipping ${name}: media storage directory SOP class`);
        skipped++;
        continue;
      }

      const seriesId = seriesIdFromDescription(header.seriesDescription);
      const seriesDir = path.join(layout.dicom, seriesId);
      await fs.promises.mkdir(seriesDir, { recursive: true });
      await fs.promises.copyFile(file.path, path.join(seriesDir, withDcmExtension(name)));
      series.add(seriesId);
      saved++;
    } catch (error) {
      log.warn(`Skipping file ${name}: ${errorMessage(error)}`);
      skipped++;
    }
  }

  log.info(`Saved ${saved} DICOM files into ${series.size} series (${skipped} skipped)`);
  return { saved, skipped, series: [...series].sort() };
}
