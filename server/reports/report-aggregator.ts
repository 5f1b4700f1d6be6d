import fs from 'fs';
import path from 'path';
import {
  AVERAGES_KEY,
  STRUCTURE_KEY,
  reportCategories,
  reportDocumentSchema,
  type AveragedDocument,
  type AveragedRecord,
  type GlobalDocument,
  type ReportCategory,
  type ReportDocument,
} from '@shared/schema';
import type { ZodType, ZodTypeDef } from 'zod';
import { errorMessage } from '../errors';
import { forSource } from '../logger';
import { reportFileName, writeJsonDocument } from './report-builder';
import { round2 } from './stats-reader';

const log = forSource('reports');

/** Result of loading a document that may be absent or broken. */
export type Loaded<T> =
  | { ok: true; document: T }
  | { ok: false; reason: 'missing' | 'unparsable'; detail: string };

export type LoadedDocument = Loaded<ReportDocument>;

export async function loadJsonDocument<T>(filePath: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<Loaded<T>> {
  let text: string;
  try {
    text = await fs.promises.readFile(filePath, 'utf-8');
  } catch (err) {
    return { ok: false, reason: 'missing', detail: errorMessage(err) };
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, reason: 'unparsable', detail: errorMessage(err) };
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, reason: 'unparsable', detail: parsed.error.issues[0]?.message ?? 'unexpected shape' };
  }
  return { ok: true, document: parsed.data };
}

export const loadReportDocument = (filePath: string): Promise<LoadedDocument> =>
  loadJsonDocument(filePath, reportDocumentSchema);

export const averagesDir = (jsonRoot: string): string => path.join(jsonRoot, AVERAGES_KEY);

const byStructure = (a: AveragedRecord, b: AveragedRecord): number => {
  const left = String(a[STRUCTURE_KEY]);
  const right = String(b[STRUCTURE_KEY]);
  return left < right ? -1 : left > right ? 1 : 0;
};

interface Accumulator {
  count: number;
  totals: Map<string, number>;
}

/**
 * Field-wise means across series, keyed by (sub-key, Structure). Series whose
 * document is missing or unparsable are skipped with a warning.
 */
export function averageDocuments(documents: Array<{ source: string; document: ReportDocument }>): AveragedDocument {
  const cumulative = new Map<string, Map<string, Accumulator>>();

  for (const { source, document } of documents) {
    for (const [subKey, entries] of Object.entries(document)) {
      let structures = cumulative.get(subKey);
      if (!structures) {
        structures = new Map();
        cumulative.set(subKey, structures);
      }
      for (const entry of entries) {
        const structure = entry[STRUCTURE_KEY];
        if (typeof structure !== 'string' || structure.length === 0) {
          log.warn(`Missing '${STRUCTURE_KEY}' in entry ${JSON.stringify(entry)} in ${source}`);
          continue;
        }
        let acc = structures.get(structure);
        if (!acc) {
          acc = { count: 0, totals: new Map() };
          structures.set(structure, acc);
        }
        acc.count += 1;
        for (const [field, value] of Object.entries(entry)) {
          if (field === STRUCTURE_KEY) continue;
          if (typeof value === 'number' && Number.isFinite(value)) {
            acc.totals.set(field, (acc.totals.get(field) ?? 0) + value);
          } else {
            log.warn(`Non-numeric value for '${field}' of ${structure} in ${source}`);
          }
        }
      }
    }
  }

  const averaged: AveragedDocument = {};
  for (const [subKey, structures] of cumulative) {
    const records: AveragedRecord[] = [];
    for (const [structure, acc] of structures) {
      const record: AveragedRecord = { [STRUCTURE_KEY]: structure };
      for (const [field, total] of acc.totals) {
        record[field] = round2(total / acc.count);
      }
      records.push(record);
    }
    averaged[subKey] = records.sort(byStructure);
  }
  return averaged;
}

/**
 * Averages one category across the given series and writes it to
 * `{jsonRoot}/AVERAGES/{category}.json`.
 */
export async function averageReports(jsonRoot: string, series: readonly string[], category: ReportCategory): Promise<AveragedDocument> {
  const documents: Array<{ source: string; document: ReportDocument }> = [];
  for (const name of series) {
    const source = path.join(jsonRoot, name, reportFileName(category));
    const loaded = await loadReportDocument(source);
    if (!loaded.ok) {
      log.warn(`Skipping ${source} (${loaded.reason}): ${loaded.detail}`);
      continue;
    }
    documents.push({ source, document: loaded.document });
  }

  const averaged = averageDocuments(documents);
  const target = path.join(averagesDir(jsonRoot), reportFileName(category));
  await writeJsonDocument(target, averaged);
  log.info(`Averaged ${category} over ${documents.length}/${series.length} series written to ${target}`);
  return averaged;
}

/**
 * Builds the study-wide "global" document per category: each series' document
 * under its name plus the averages under AVERAGES, written to
 * `{jsonRoot}/{category}.json`. Absent inputs leave their key out.
 */
export async function consolidateReports(jsonRoot: string, series: readonly string[]): Promise<Record<ReportCategory, GlobalDocument>> {
  const result: Record<ReportCategory, GlobalDocument> = { subcortical: {}, cortical: {}, general: {} };

  for (const category of reportCategories) {
    const global = result[category];
    const scopes = [...series.map((name) => ({ key: name, dir: path.join(jsonRoot, name) })), { key: AVERAGES_KEY, dir: averagesDir(jsonRoot) }];
    for (const scope of scopes) {
      const source = path.join(scope.dir, reportFileName(category));
      const loaded = await loadReportDocument(source);
      if (!loaded.ok) {
        log.error(`Error reading ${source} (${loaded.reason}): ${loaded.detail}`);
        continue;
      }
      global[scope.key] = loaded.document;
    }

    const target = path.join(jsonRoot, reportFileName(category));
    await writeJsonDocument(target, global);
    log.info(`Wrote global ${category} document to ${target}`);
  }
  return result;
}

/** Averages every category, then consolidates. */
export async function aggregateStudyReports(jsonRoot: string, series: readonly string[]): Promise<void> {
  for (const category of reportCategories) {
    await averageReports(jsonRoot, series, category);
  }
  await consolidateReports(jsonRoot, series);
}
