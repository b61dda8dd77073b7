import fs from 'node:fs';
import path from 'node:path';
import Papa from 'papaparse';
import { z } from 'zod';
import type { Alert, ClinicalMetrics, MetricField, RehabPhase, SessionRecord } from '@/types';
import { PHASE_ORDER } from '@/constants/phase-guidance';

/** CSV column order; metric columns follow the clinical form layout */
const METRIC_COLUMNS = [
  'limbSymmetryIndex',
  'rateOfForceDevelopment',
  'painScore',
  'peakForce',
  'leftLimbForce',
  'rightLimbForce',
  'daysSinceInjury',
  'daysSinceSurgery',
  'rangeOfMotion',
  'swellingGrade',
] as const satisfies readonly MetricField[];

export const SESSION_COLUMNS = [
  'timestamp',
  'patientId',
  'injuryType',
  ...METRIC_COLUMNS,
  'phase',
  'alerts',
  'notes',
] as const;

type SessionColumn = typeof SESSION_COLUMNS[number];
type SessionRow = Record<SessionColumn, string>;

export interface SessionStore {
  readonly filePath: string;
  append(record: SessionRecord): void;
  readAll(): SessionRecord[];
  readForPatient(patientId: string): SessionRecord[];
}

const alertsSchema = z.array(z.object({
  ruleId: z.string(),
  severity: z.enum(['info', 'warning', 'critical']),
  message: z.string(),
}));

// ---------------------------------------------------------------------------
// Row conversion
// ---------------------------------------------------------------------------

/**
 * @throws Error for a metric the reader could not load back
 */
function toRow(record: SessionRecord): SessionRow {
  const metric = (field: MetricField) => {
    const value = record.metrics[field];
    if (value === undefined) return '';
    if (!Number.isFinite(value)) {
      throw new Error(`Cannot log session for ${record.patientId}: ${field} is not a finite number (${value})`);
    }
    return String(value);
  };

  return {
    timestamp: record.timestamp,
    patientId: record.patientId,
    injuryType: record.injuryType,
    limbSymmetryIndex: metric('limbSymmetryIndex'),
    rateOfForceDevelopment: metric('rateOfForceDevelopment'),
    painScore: metric('painScore'),
    peakForce: metric('peakForce'),
    leftLimbForce: metric('leftLimbForce'),
    rightLimbForce: metric('rightLimbForce'),
    daysSinceInjury: metric('daysSinceInjury'),
    daysSinceSurgery: metric('daysSinceSurgery'),
    rangeOfMotion: metric('rangeOfMotion'),
    swellingGrade: metric('swellingGrade'),
    phase: record.phase,
    alerts: JSON.stringify(record.alerts),
    notes: record.notes,
  };
}

function isRehabPhase(value: string): value is RehabPhase {
  return value === 'Unclassified' || PHASE_ORDER.some(phase => phase === value);
}

/** '' -> undefined, numeric text -> number, anything else -> NaN */
function parseCell(cell: string | undefined): number | undefined {
  const text = (cell ?? '').trim();
  return text === '' ? undefined : Number(text);
}

function parseAlerts(cell: string | undefined): Alert[] | null {
  const text = (cell ?? '').trim();
  if (text === '') return [];
  try {
    const parsed = alertsSchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Convert a parsed CSV row back to a record
 * @returns The record, or a reason the row cannot be read
 */
function fromRow(row: Partial<Record<string, string>>): SessionRecord | string {
  const timestamp = (row.timestamp ?? '').trim();
  const patientId = (row.patientId ?? '').trim();
  const injuryType = (row.injuryType ?? '').trim();
  const phase = (row.phase ?? '').trim();

  if (!timestamp || isNaN(Date.parse(timestamp))) return `invalid timestamp "${timestamp}"`;
  if (!patientId) return 'missing patientId';
  if (!injuryType) return 'missing injuryType';
  if (!isRehabPhase(phase)) return `unknown phase "${phase}"`;

  const values: Partial<Record<MetricField, number>> = {};
  for (const field of METRIC_COLUMNS) {
    const value = parseCell(row[field]);
    if (value === undefined) continue;
    if (!Number.isFinite(value)) return `${field} is not a number`;
    values[field] = value;
  }

  const { limbSymmetryIndex, painScore } = values;
  if (limbSymmetryIndex === undefined) return 'missing limbSymmetryIndex';
  if (painScore === undefined) return 'missing painScore';

  const alerts = parseAlerts(row.alerts);
  if (!alerts) return 'unreadable alerts';

  const metrics: ClinicalMetrics = { ...values, injuryType, limbSymmetryIndex, painScore };
  return { patientId, timestamp, injuryType, metrics, phase, alerts, notes: row.notes ?? '' };
}

// ---------------------------------------------------------------------------
// Store
// ---------------------------------------------------------------------------

function needsHeader(filePath: string): boolean {
  return !fs.existsSync(filePath) || fs.statSync(filePath).size === 0;
}

/**
 * Append-only CSV session log.
 * I/O errors propagate to the caller.
 */
export function createSessionStore(filePath: string): SessionStore {
  function readAll(): SessionRecord[] {
    if (!fs.existsSync(filePath)) return [];

    const text = fs.readFileSync(filePath, 'utf8');
    const parsed = Papa.parse<Partial<Record<string, string>>>(text, {
      header: true,
      skipEmptyLines: true,
    });

    const records: SessionRecord[] = [];
    parsed.data.forEach((row, index) => {
      const record = fromRow(row);
      if (typeof record === 'string') {
        // Header is line 1
        console.warn(`Skipping session row ${index + 2} in ${filePath}: ${record}`);
        return;
      }
      records.push(record);
    });
    return records;
  }

  return {
    filePath,

    append(record: SessionRecord): void {
      const row = toRow(record);
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      const csv = Papa.unparse([row], {
        columns: [...SESSION_COLUMNS],
        header: needsHeader(filePath),
        newline: '\n',
      });
      fs.appendFileSync(filePath, `${csv}\n`, 'utf8');
      console.log(`Saved ${record.phase} session for ${record.patientId} to ${filePath}`);
    },

    readAll,

    readForPatient(patientId: string): SessionRecord[] {
      const id = patientId.trim();
      return readAll().filter(record => record.patientId === id);
    },
  };
}
