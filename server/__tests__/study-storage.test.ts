/**
 * Study Storage Unit Tests
 *
 * @requirement REQ-STORE-001
 * @risk-class medium
 * @verification VER-STORE-001
 *
 * Identifier sanitising and the fixed per-study folder tree.
 */

import fs from 'fs';
import path from 'path';
import {
  UNKNOWN_SERIES,
  discoverSeries,
  ensureStudyLayout,
  niftiPath,
  sanitizeId,
  seriesIdFromDescription,
  studyLayout,
  studyRoot,
} from '../study-storage';
import { FREESURFER_PROFILE, makeTempDir, removeDir, writeText } from './support';

describe('Study Storage', () => {
  describe('sanitizeId', () => {
    it('should keep alphanumerics, underscore and dash only', () => {
      expect(sanitizeId('Pat 01/../x_y-z')).toBe('Pat01x_y-z');
      expect(sanitizeId('../..')).toBe('');
      expect(sanitizeId(undefined)).toBe('');
    });
  });

  describe('seriesIdFromDescription', () => {
    it('should turn spaces into underscores before sanitising', () => {
      expect(seriesIdFromDescription(' T1 MPRAGE ')).toBe('T1_MPRAGE');
      expect(seriesIdFromDescription('Ax FLAIR (3D)')).toBe('Ax_FLAIR_3D');
    });

    it('should fall back to UNKNOWN for empty descriptions', () => {
      expect(seriesIdFromDescription(undefined)).toBe(UNKNOWN_SERIES);
      expect(seriesIdFromDescription('   ')).toBe(UNKNOWN_SERIES);
      expect(seriesIdFromDescription('***')).toBe(UNKNOWN_SERIES);
    });

    it('should not let a series take the averages name', () => {
      expect(seriesIdFromDescription('AVERAGES')).toBe('AVERAGES_SERIES');
    });
  });

  it('should build the study root from sanitised ids', () => {
    expect(studyRoot('/data', 'P 1', 'S/2')).toBe(path.join('/data', 'P1', 'S2'));
  });

  describe('ensureStudyLayout', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it('should create the tool folders for the profile', async () => {
      const layout = await ensureStudyLayout(dir, FREESURFER_PROFILE);

      expect((await fs.promises.readdir(dir)).sort()).toEqual([
        'CORESTATS',
        'DICOM',
        'FREESURFER',
        'JSON',
        'NIFTI',
        'SAMSEG',
        'WORKFLOWS',
      ]);
      expect(niftiPath(layout, 'T1')).toBe(path.join(dir, 'NIFTI', 'T1.nii.gz'));
    });

    it('should add the FastSurfer folder when that tool is selected', async () => {
      await ensureStudyLayout(dir, { lesionSegmentation: true, hypothalamusTool: 'fastsurfer' });

      expect(fs.existsSync(path.join(dir, 'FASTSURFER'))).toBe(true);
    });

    it('should discover series folders sorted and ignore loose files', async () => {
      const layout = await ensureStudyLayout(dir, FREESURFER_PROFILE);
      await writeText(path.join(layout.dicom, 'T1', 'a.dcm'), 'x');
      await writeText(path.join(layout.dicom, 'FLAIR', 'b.dcm'), 'x');
      await writeText(path.join(layout.dicom, 'stray.dcm'), 'x');

      expect(await discoverSeries(layout)).toEqual(['FLAIR', 'T1']);
    });

    it('should discover no series when DICOM is missing', async () => {
      expect(await discoverSeries(studyLayout(path.join(dir, 'absent')))).toEqual([]);
    });
  });
});
