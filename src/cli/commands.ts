/**
 * Command-line interface
 *
 *   rehab injuries
 *   rehab assess --injury ACL --lsi 92 --pain 1 --rfd 95 [--explain] [--html report.html]
 *   rehab log --patient P-001 --injury ACL --lsi 80 --pain 2 [--notes ..]
 *   rehab history --patient P-001
 *   rehab report --patient P-001 --out report.html
 *   rehab exercises [--injury ACL] [--phase Mid] [--type Strength] [--equipment band] [--query band]
 *   rehab add-exercise --injury ACL --phase Mid --name "Step Down" --type Strength --goal ..
 */

import fs from 'node:fs';
import path from 'node:path';
import { parseArgs } from 'node:util';
import type { PhaseResult, RehabPhase } from '@/types';
import type { EngineResult } from '@/engine/errors';
import { METRIC_FIELDS, METRIC_FIELD_SPECS } from '@/constants/injury-thresholds';
import { PHASE_ORDER } from '@/constants/phase-guidance';
import { determinePhase, listInjuryTypes, validateMetrics, type RawMetricInput } from '@/engine';
import { addExercise, DEFAULT_CATALOG_PATH, loadExerciseCatalog, recommendExercises, searchExercises } from '@/exercises';
import { buildSessionRecord, createSessionStore, summarizeSessions } from '@/sessions';
import {
  formatErrorText,
  formatPhaseResultText,
  formatSummaryText,
  renderAssessmentPage,
  renderDashboardPage,
} from '@/ui';

export const DEFAULT_STORE_PATH = 'data/session_log.csv';

/** Where command output goes; console by default */
export interface CliOutput {
  log(message: string): void;
  error(message: string): void;
}

const OPTIONS = {
  injury: { type: 'string' },
  patient: { type: 'string' },
  store: { type: 'string' },
  out: { type: 'string' },
  notes: { type: 'string' },
  phase: { type: 'string' },
  type: { type: 'string' },
  query: { type: 'string' },
  equipment: { type: 'string' },
  catalog: { type: 'string' },
  html: { type: 'string' },
  id: { type: 'string' },
  name: { type: 'string' },
  goal: { type: 'string' },
  progression: { type: 'string' },
  explain: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
  // Metric flags, see METRIC_FIELD_SPECS[field].cliFlag
  lsi: { type: 'string' },
  pain: { type: 'string' },
  rfd: { type: 'string' },
  'peak-force': { type: 'string' },
  left: { type: 'string' },
  right: { type: 'string' },
  'days-since-injury': { type: 'string' },
  'days-since-surgery': { type: 'string' },
  rom: { type: 'string' },
  swelling: { type: 'string' },
} as const;

export const USAGE = `Usage: rehab <command> [flags]

Commands:
  injuries                          List supported injury types
  assess --injury <type> [metrics] [--html <file>]
                                    Determine the rehabilitation phase
  log --patient <id> --injury <type> [metrics] [--notes <text>]
                                    Assess and append to the session log
  history --patient <id>            Show progress across logged sessions
  report --patient <id> --out <file>
                                    Write an HTML progress dashboard
  exercises [--injury <type>] [--phase <phase>] [--type <type>] [--equipment <text>] [--query <text>]
                                    Search the exercise catalog
  add-exercise --injury <type> --phase <phase> --name <name> --type <type> --goal <text>
               [--id <id>] [--equipment <text>] [--progression <text>]
                                    Add an exercise to the catalog

Metrics:
${METRIC_FIELDS.map(f => `  --${METRIC_FIELD_SPECS[f].cliFlag.padEnd(20)}${METRIC_FIELD_SPECS[f].label}`).join('\n')}

Flags:
  --explain                         Show how the phase was chosen
  --html <file>                     Also write the assessment as an HTML page
  --store <file>                    Session log (default ${DEFAULT_STORE_PATH})
  --catalog <file>                  Exercise catalog (default: built-in)`;

/** A usage problem: reported with the usage text, exit code 1 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

type Values = Record<string, unknown>;

function readString(values: Values, key: string): string | undefined {
  const value = values[key];
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function requireString(values: Values, key: string): string {
  const value = readString(values, key);
  if (value === undefined) throw new UsageError(`--${key} is required`);
  return value;
}

function isRehabPhase(value: string): value is RehabPhase {
  return value === 'Unclassified' || PHASE_ORDER.some(phase => phase === value);
}

function writeFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf8');
}

function requirePhase(values: Values): RehabPhase {
  const phase = requireString(values, 'phase');
  if (!isRehabPhase(phase)) {
    throw new UsageError(`Unknown phase "${phase}". Phases: ${PHASE_ORDER.join(', ')}`);
  }
  return phase;
}

function catalogPath(values: Values): string {
  return readString(values, 'catalog') ?? DEFAULT_CATALOG_PATH;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

/**
 * Validate metric flags and determine the phase.
 * With --html the outcome is also written as a page, problems included.
 * @returns The result, or null after printing the problems
 */
function assess(values: Values, output: CliOutput): PhaseResult | null {
  const injury = requireString(values, 'injury');
  const htmlFile = readString(values, 'html');

  const raw: RawMetricInput = {};
  for (const field of METRIC_FIELDS) {
    raw[field] = readString(values, METRIC_FIELD_SPECS[field].cliFlag);
  }

  const validated = validateMetrics(injury, raw);
  const outcome: EngineResult<PhaseResult> = validated.ok
    ? determinePhase(validated.value.injuryType, validated.value, { explain: values.explain === true })
    : validated;

  if (!outcome.ok) {
    output.error(formatErrorText(outcome.error));
    if (htmlFile) writeFile(htmlFile, renderAssessmentPage(outcome, injury));
    return null;
  }

  const result = outcome.value;
  output.log(formatPhaseResultText(result));

  const exercises = recommendExercises(loadExerciseCatalog(catalogPath(values)), result.injuryType, result.phase);
  if (exercises.length > 0) {
    output.log(['', 'Recommended exercises:', ...exercises.map(e => `  - ${e.name} (${e.type})`)].join('\n'));
  }

  if (htmlFile) {
    writeFile(htmlFile, renderAssessmentPage(outcome, result.injuryType, { exercises }));
    output.log(`Assessment written to ${htmlFile}`);
  }
  return result;
}

function listInjuries(output: CliOutput): number {
  listInjuryTypes().forEach(option => output.log(option.label));
  return 0;
}

function logSession(values: Values, output: CliOutput): number {
  const patientId = requireString(values, 'patient');
  const result = assess(values, output);
  if (!result) return 1;

  const store = createSessionStore(readString(values, 'store') ?? DEFAULT_STORE_PATH);
  store.append(buildSessionRecord(patientId, result, { notes: readString(values, 'notes') }));
  output.log(`\nSession logged for ${patientId}`);
  return 0;
}

function showHistory(values: Values, output: CliOutput): number {
  const patientId = requireString(values, 'patient');
  const store = createSessionStore(readString(values, 'store') ?? DEFAULT_STORE_PATH);
  output.log(formatSummaryText(summarizeSessions(store.readForPatient(patientId), patientId)));
  return 0;
}

function writeReport(values: Values, output: CliOutput): number {
  const patientId = requireString(values, 'patient');
  const outFile = requireString(values, 'out');
  const store = createSessionStore(readString(values, 'store') ?? DEFAULT_STORE_PATH);

  writeFile(outFile, renderDashboardPage(patientId, store.readForPatient(patientId)));
  output.log(`Dashboard written to ${outFile}`);
  return 0;
}

function findExercises(values: Values, output: CliOutput): number {
  const phase = readString(values, 'phase') === undefined ? undefined : requirePhase(values);

  const matches = searchExercises(loadExerciseCatalog(catalogPath(values)), {
    injuryType: readString(values, 'injury'),
    phase,
    type: readString(values, 'type'),
    equipment: readString(values, 'equipment'),
    query: readString(values, 'query'),
  });

  if (matches.length === 0) {
    output.log('No exercises match.');
    return 0;
  }
  matches.forEach(e => output.log(`${e.name} [${e.injuryType}, ${e.phase}, ${e.type}] - ${e.goal}`));
  return 0;
}

/** "Rotator Cuff" + "Wall Slide" -> "rotator-cuff-wall-slide" */
function exerciseId(injuryType: string, name: string): string {
  return `${injuryType} ${name}`.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-|-$/g, '');
}

function addToCatalog(values: Values, output: CliOutput): number {
  const injuryType = requireString(values, 'injury');
  const phase = requirePhase(values);
  const name = requireString(values, 'name');
  const filePath = catalogPath(values);

  const exercise = addExercise({
    id: readString(values, 'id') ?? exerciseId(injuryType, name),
    injuryType,
    phase,
    name,
    type: requireString(values, 'type'),
    goal: requireString(values, 'goal'),
    equipment: readString(values, 'equipment') ?? 'None',
    progression: readString(values, 'progression') ?? '',
  }, filePath);

  output.log(`Added ${exercise.name} (${exercise.id}) to ${filePath}`);
  return 0;
}

// ---------------------------------------------------------------------------
// Entry
// ---------------------------------------------------------------------------

function dispatch(command: string | undefined, values: Values, output: CliOutput): number {
  switch (command) {
    case 'injuries':
      return listInjuries(output);
    case 'assess':
      return assess(values, output) ? 0 : 1;
    case 'log':
      return logSession(values, output);
    case 'history':
      return showHistory(values, output);
    case 'report':
      return writeReport(values, output);
    case 'exercises':
      return findExercises(values, output);
    case 'add-exercise':
      return addToCatalog(values, output);
    default:
      throw new UsageError(command ? `Unknown command "${command}"` : 'No command given');
  }
}

/**
 * Run the CLI
 * @param argv - Arguments after the script name
 * @returns Process exit code
 */
export function runCli(argv: string[], output: CliOutput = console): number {
  try {
    const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
    if (values.help) {
      output.log(USAGE);
      return 0;
    }
    return dispatch(positionals[0], values, output);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof UsageError || (error instanceof TypeError && 'code' in error)) {
      output.error(`${message}\n\n${USAGE}`);
    } else {
      output.error(`Error: ${message}`);
    }
    return 1;
  }
}
