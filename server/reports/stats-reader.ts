import fs from 'fs';
import path from 'path';
import {
  LHS_VOLUME_KEY,
  RHS_VOLUME_KEY,
  VOLUME_KEY,
  type BilateralVolumeRecord,
  type ParcellationRecord,
  type UnilateralVolumeRecord,
} from '@shared/schema';
import { NotFoundError, errorMessage, isNotFound } from '../errors';
import { forSource } from '../logger';

const log = forSource('stats-reader');

/** Header lines preceding the data rows of each FreeSurfer stats format. */
export const HEADER_LINES = {
  aseg: 80,
  wmparc: 66,
  dktAtlas: 61,
  fastsurfer: 55,
} as const;

export type StatsRow = string[];

/**
 * Half-up rounding to 2 decimals. The epsilon keeps values such as 1.005,
 * whose binary form sits just below the midpoint, rounding up.
 */
export function round2(value: number): number {
  const sign = value < 0 ? -1 : 1;
  return (sign * Math.round((Math.abs(value) + Number.EPSILON) * 100)) / 100;
}

/** Strict decimal parse: `"12.5"` → 12.5, `"12abc"` / `""` → null. */
export function parseDecimal(token: string | undefined): number | null {
  if (token === undefined) return null;
  const trimmed = token.trim();
  if (!/^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function parseInteger(token: string | undefined): number | null {
  if (token === undefined || !/^[-+]?\d+$/.test(token.trim())) return null;
  return Number.parseInt(token, 10);
}

/**
 * Reads a whitespace-delimited text file into token rows, dropping blank lines
 * and the first `skip` rows.
 */
export async function readStatsRows(filePath: string, skip = 0): Promise<StatsRow[]> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) throw new NotFoundError(filePath);
    throw err;
  }
  const rows = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => line.split(/\s+/));
  return rows.slice(skip);
}

/**
 * Applies `parse` to every row; a row it rejects (null or throw) is logged and
 * skipped, never failing the file.
 */
export function collectRows<R extends unknown[], T>(rows: R[], parse: (row: R) => T | null, source: string): T[] {
  const records: T[] = [];
  rows.forEach((row, index) => {
    const text = row.flat().join(' ');
    let record: T | null;
    try {
      record = parse(row);
    } catch (err) {
      log.warn(`${source} row ${index + 1} skipped (${text}): ${errorMessage(err)}`);
      return;
    }
    if (record === null) {
      log.warn(`${source} row ${index + 1} skipped: malformed row "${text}"`);
      return;
    }
    records.push(record);
  });
  return records;
}

const label = (filePath: string) => path.basename(filePath);

/** `<name> <volume>` rows. */
export async function readNameVolumeFile(filePath: string): Promise<UnilateralVolumeRecord[]> {
  const rows = await readStatsRows(filePath);
  return collectRows(rows, (row) => {
    const volume = parseDecimal(row[1]);
    if (row.length < 2 || volume === null) return null;
    return { Structure: row[0], [VOLUME_KEY]: round2(volume) };
  }, label(filePath));
}

/**
 * Zips two `<name> <volume>` files row by row into bilateral records named
 * after the left file. The shorter file ends the pairing.
 */
export async function readPairedVolumes(leftFile: string, rightFile: string): Promise<BilateralVolumeRecord[]> {
  const [left, right] = await Promise.all([readStatsRows(leftFile), readStatsRows(rightFile)]);
  if (left.length !== right.length) {
    log.warn(`${label(leftFile)} has ${left.length} rows, ${label(rightFile)} has ${right.length}; extra rows dropped`);
  }
  const pairs: Array<[StatsRow, StatsRow]> = [];
  for (let i = 0; i < Math.min(left.length, right.length); i++) {
    pairs.push([left[i], right[i]]);
  }
  return collectRows(pairs, ([leftRow, rightRow]) => {
    const lhs = parseDecimal(leftRow[1]);
    const rhs = parseDecimal(rightRow[1]);
    if (lhs === null || rhs === null) return null;
    return {
      Structure: leftRow[0],
      [LHS_VOLUME_KEY]: round2(lhs),
      [RHS_VOLUME_KEY]: round2(rhs),
    };
  }, `${label(leftFile)}+${label(rightFile)}`);
}

interface SidedVolume {
  side: 'left' | 'right';
  name: string;
  volume: number;
}

/**
 * Merges per-side volumes into bilateral records keyed by structure name. The
 * left side fixes the order; a missing counterpart becomes null.
 */
export function pairBySide(volumes: SidedVolume[]): BilateralVolumeRecord[] {
  const right = new Map<string, number>();
  const left = new Map<string, number>();
  const names: string[] = [];
  for (const entry of volumes) {
    if (entry.side === 'left') {
      if (!left.has(entry.name)) names.push(entry.name);
      left.set(entry.name, entry.volume);
    } else {
      right.set(entry.name, entry.volume);
    }
  }
  return names.map((name) => ({
    Structure: name,
    [LHS_VOLUME_KEY]: left.get(name) ?? null,
    [RHS_VOLUME_KEY]: right.get(name) ?? null,
  }));
}

/** ThalamicNuclei.volumes.txt: `Left-<nucleus>` / `Right-<nucleus>` rows. */
export async function readThalamicNuclei(filePath: string): Promise<BilateralVolumeRecord[]> {
  const rows = await readStatsRows(filePath);
  const sided = collectRows<StatsRow, SidedVolume | false>(rows, (row) => {
    const volume = parseDecimal(row[1]);
    if (row.length < 2 || volume === null) return null;
    if (row[0].includes('Left')) return { side: 'left', name: row[0].replace('Left-', ''), volume: round2(volume) };
    if (row[0].includes('Right')) return { side: 'right', name: row[0].replace('Right-', ''), volume: round2(volume) };
    return false;
  }, label(filePath));
  return pairBySide(sided.filter((entry): entry is SidedVolume => entry !== false));
}

/**
 * FreeSurfer segmentation table rows (`Index SegId NVoxels Volume_mm3 StructName ...`),
 * already past the header. Volume is token 3, name token 4.
 */
export function segmentationRows(rows: StatsRow[], source: string): UnilateralVolumeRecord[] {
  return collectRows(rows, (row) => {
    if (row.length < 5) return null;
    const volume = parseDecimal(row[3]);
    if (volume === null) return null;
    return { Structure: row[4], [VOLUME_KEY]: round2(volume) };
  }, source);
}

export async function readSegmentationStats(filePath: string, skip: number): Promise<UnilateralVolumeRecord[]> {
  return segmentationRows(await readStatsRows(filePath, skip), label(filePath));
}

/** wmparc.stats: `wm-lh-<parcel>` / `wm-rh-<parcel>` rows paired by parcel. */
export async function readWhiteMatterParcels(filePath: string): Promise<BilateralVolumeRecord[]> {
  const records = await readSegmentationStats(filePath, HEADER_LINES.wmparc);
  const sided: SidedVolume[] = [];
  for (const record of records) {
    const name = record.Structure;
    if (name.includes('wm-lh')) sided.push({ side: 'left', name: name.replace('wm-lh-', ''), volume: record[VOLUME_KEY] });
    else if (name.includes('wm-rh')) sided.push({ side: 'right', name: name.replace('wm-rh-', ''), volume: record[VOLUME_KEY] });
  }
  return pairBySide(sided);
}

/**
 * brainvol.stats `# Measure <Name>, <Key>, <Description>, <value>, <unit>` lines.
 * The value is truncated to whole mm3.
 */
export async function readBrainVolumes(filePath: string): Promise<UnilateralVolumeRecord[]> {
  const rows = await readStatsRows(filePath);
  return collectRows(rows, (row) => {
    if (row.length < 4) return null;
    const valueToken = row[row.length - 2];
    const volume = parseDecimal(valueToken.slice(0, -1));
    if (volume === null) return null;
    return { Structure: row[2].replace(/,/g, ''), [VOLUME_KEY]: Math.trunc(volume) };
  }, label(filePath));
}

/** ?h.aparc.DKTatlas.stats table rows. */
export async function readCorticalParcellation(filePath: string): Promise<ParcellationRecord[]> {
  const rows = await readStatsRows(filePath, HEADER_LINES.dktAtlas);
  return collectRows(rows, (fields) => {
    const surfaceArea = parseInteger(fields[2]);
    const grayVolume = parseInteger(fields[3]);
    const thickness = parseDecimal(fields[4]);
    const curvature = parseDecimal(fields[6]);
    if (surfaceArea === null || grayVolume === null || thickness === null || curvature === null) return null;
    return {
      Structure: fields[0],
      'Surface Area (mm2)': surfaceArea,
      'Gray Matter Vol (mm3)': grayVolume,
      'Thickness Avg (mm)': thickness,
      'Mean Curvature (mm-1)': curvature,
    };
  }, label(filePath));
}

const splitCsvLine = (line: string): string[] => line.split(',').map((cell) => cell.trim());

/**
 * hypothalamic_subunits_volumes.v1.csv: one header row of named columns and one
 * value row. `whole left` / `whole right` are renamed to the `left ` / `right `
 * prefix scheme before splitting into bilateral records.
 */
export async function readHypothalamicSubunits(filePath: string): Promise<BilateralVolumeRecord[]> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    if (isNotFound(err)) throw new NotFoundError(filePath);
    throw err;
  }
  const lines = text.split(/\r?\n/).filter((line) => line.trim().length > 0);
  if (lines.length < 2) {
    log.warn(`${label(filePath)} has no value row`);
    return [];
  }
  const header = splitCsvLine(lines[0]);
  const values = splitCsvLine(lines[1]);

  const columns = new Map<string, string | undefined>();
  header.forEach((column, index) => columns.set(column, values[index]));
  columns.delete('subject');

  const renames: Array<[string, string]> = [['whole left', 'left whole'], ['whole right', 'right whole']];
  for (const [from, to] of renames) {
    if (columns.has(from)) {
      const value = columns.get(from);
      columns.delete(from);
      columns.set(to, value);
    }
  }

  const sided: SidedVolume[] = [];
  for (const [column, raw] of columns) {
    const side = column.includes('left') ? 'left' : column.includes('right') ? 'right' : null;
    if (!side) continue;
    const volume = parseDecimal(raw);
    if (volume === null) {
      log.warn(`${label(filePath)} column "${column}" skipped: non-numeric value "${raw ?? ''}"`);
      continue;
    }
    sided.push({ side, name: column.replace(`${side} `, ''), volume: round2(volume) });
  }
  return pairBySide(sided);
}

/** FastSurfer HypVINN stats; `L-`/`R-` prefixes become `Left`/`Right`. */
export async function readHypvinnStats(filePath: string): Promise<UnilateralVolumeRecord[]> {
  const records = await readSegmentationStats(filePath, HEADER_LINES.fastsurfer);
  return records.map((record) => {
    const name = record.Structure;
    if (name.startsWith('L-')) return { ...record, Structure: `Left${name.slice(2)}` };
    if (name.startsWith('R-')) return { ...record, Structure: `Right${name.slice(2)}` };
    return record;
  });
}

/** FastSurfer CerebNet stats. */
export const readCerebnetStats = (filePath: string): Promise<UnilateralVolumeRecord[]> =>
  readSegmentationStats(filePath, HEADER_LINES.fastsurfer);
