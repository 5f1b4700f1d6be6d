import fs from 'fs';
import path from 'path';
import type { PipelineProfile } from '../config';
import { NotFoundError } from '../errors';
import { forSource } from '../logger';
import { pathExists, type StudyLayout } from '../study-storage';

const log = forSource('corestats');

async function listFiles(directory: string, extension: string): Promise<string[]> {
  if (!(await pathExists(directory))) return [];
  const entries = await fs.promises.readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(extension))
    .map((entry) => entry.name)
    .sort();
}

async function copyRenamed(sourceDir: string, targetDir: string, extension: string, renameTo?: string): Promise<string[]> {
  const copied: string[] = [];
  for (const name of await listFiles(sourceDir, extension)) {
    const targetName = renameTo ? name.slice(0, -extension.length) + renameTo : name;
    await fs.promises.copyFile(path.join(sourceDir, name), path.join(targetDir, targetName));
    copied.push(targetName);
  }
  return copied;
}

/**
 * Copies the raw stats of one series into CORESTATS/{series}: `*.stats` become
 * `*.txt`, volume tables under mri/ keep their names.
 */
export async function collectCoreStats(layout: StudyLayout, series: string, profile: PipelineProfile): Promise<string[]> {
  const subjectDir = path.join(layout.freesurfer, series);
  if (!(await pathExists(subjectDir))) {
    throw new NotFoundError(subjectDir, 'FreeSurfer subject');
  }

  const targetDir = path.join(layout.corestats, series);
  await fs.promises.mkdir(targetDir, { recursive: true });

  const copied = [
    ...(await copyRenamed(path.join(subjectDir, 'stats'), targetDir, '.stats', '.txt')),
    ...(await copyRenamed(path.join(subjectDir, 'mri'), targetDir, '.txt')),
  ];
  if (profile.hypothalamusTool === 'fastsurfer') {
    copied.push(...(await copyRenamed(path.join(layout.fastsurfer, series, 'stats'), targetDir, '.stats', '.txt')));
  }

  log.info(`Copied ${copied.length} stats files for ${series}`);
  return copied;
}
