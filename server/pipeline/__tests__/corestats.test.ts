import fs from 'fs';
import path from 'path';
import { NotFoundError } from '../../errors';
import { logger } from '../../logger';
import { studyLayout, type StudyLayout } from '../../study-storage';
import { collectCoreStats } from '../corestats';
import { FREESURFER_PROFILE, makeTempDir, removeDir, writeText } from '../../__tests__/support';

describe('collectCoreStats', () => {
  let dir: string;
  let layout: StudyLayout;

  beforeEach(async () => {
    dir = await makeTempDir();
    layout = studyLayout(dir);
    vi.spyOn(logger, 'info').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it('should copy stats as .txt and mri tables unchanged', async () => {
    await writeText(path.join(layout.freesurfer, 'T1', 'stats', 'aseg.stats'), 'aseg');
    await writeText(path.join(layout.freesurfer, 'T1', 'stats', 'lh.aparc.stats'), 'aparc');
    await writeText(path.join(layout.freesurfer, 'T1', 'mri', 'ThalamicNuclei.volumes.txt'), 'thal');
    await writeText(path.join(layout.freesurfer, 'T1', 'mri', 'aseg.mgz'), 'binary');

    const copied = await collectCoreStats(layout, 'T1', FREESURFER_PROFILE);

    expect(copied).toEqual(['aseg.txt', 'lh.aparc.txt', 'ThalamicNuclei.volumes.txt']);
    const target = path.join(layout.corestats, 'T1');
    expect((await fs.promises.readdir(target)).sort()).toEqual(['ThalamicNuclei.volumes.txt', 'aseg.txt', 'lh.aparc.txt']);
    expect(await fs.promises.readFile(path.join(target, 'aseg.txt'), 'utf-8')).toBe('aseg');
  });

  it('should include FastSurfer stats under that profile', async () => {
    await writeText(path.join(layout.freesurfer, 'T1', 'stats', 'aseg.stats'), 'aseg');
    await writeText(path.join(layout.fastsurfer, 'T1', 'stats', 'cerebellum.CerebNet.stats'), 'cereb');

    const copied = await collectCoreStats(layout, 'T1', { lesionSegmentation: true, hypothalamusTool: 'fastsurfer' });

    expect(copied).toEqual(['aseg.txt', 'cerebellum.CerebNet.txt']);
  });

  it('should fail when the FreeSurfer subject is missing', async () => {
    await expect(collectCoreStats(layout, 'T1', FREESURFER_PROFILE)).rejects.toBeInstanceOf(NotFoundError);
  });
});
