/**
 * Exercise Catalog
 *
 * Static exercise library keyed by injury type and phase, loaded from
 * src/data/exercises.json and validated once.
 */

import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { Exercise, ExerciseFilters, RehabPhase } from '@/types';
import { getPhaseGuidance } from '@/constants/phase-guidance';

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../data/exercises.json', import.meta.url));

const exerciseSchema = z.object({
  id: z.string().trim().min(1),
  injuryType: z.string().trim().min(1),
  phase: z.enum(['Early', 'Mid', 'Late', 'Return to Sport']),
  name: z.string().trim().min(1),
  type: z.string().trim().min(1),
  goal: z.string().trim(),
  equipment: z.string().trim(),
  progression: z.string().trim(),
});

const exerciseIdSchema = z.object({ id: z.string() });

/** Equipment values that mean no equipment */
const BODYWEIGHT_EQUIPMENT = ['none', '', 'bodyweight'];

let defaultCatalog: Exercise[] | null = null;

function describeIssues(issues: z.ZodIssue[], prefix: (string | number)[] = []): string[] {
  return issues.map(issue => `${[...prefix, ...issue.path].join('.')}: ${issue.message}`);
}

function invalid(source: string, problems: string[]): Error {
  return new Error(`Invalid ${source}:\n  - ${problems.join('\n  - ')}`);
}

/**
 * Parse and validate catalog JSON.
 * Entries are checked one by one so a duplicate id is reported next to
 * schema problems in other entries.
 * @throws Error listing every problem
 */
export function parseExerciseCatalog(json: string, source = 'exercise catalog'): Exercise[] {
  const entries = z.array(z.unknown()).safeParse(JSON.parse(json));
  if (!entries.success) throw invalid(source, describeIssues(entries.error.issues));

  const problems: string[] = [];
  const exercises: Exercise[] = [];
  const seen = new Set<string>();

  entries.data.forEach((entry, index) => {
    const parsed = exerciseSchema.safeParse(entry);
    if (parsed.success) {
      exercises.push(parsed.data);
    } else {
      problems.push(...describeIssues(parsed.error.issues, [index]));
    }

    const idOnly = exerciseIdSchema.safeParse(entry);
    if (!idOnly.success) return;
    const id = idOnly.data.id.trim();
    if (seen.has(id)) problems.push(`${index}.id: Duplicate exercise id "${id}"`);
    seen.add(id);
  });

  if (problems.length > 0) throw invalid(source, problems);
  return exercises;
}

/**
 * Load the catalog. The built-in file is read once per process.
 */
export function loadExerciseCatalog(filePath: string = DEFAULT_CATALOG_PATH): Exercise[] {
  const useDefault = filePath === DEFAULT_CATALOG_PATH;
  if (useDefault && defaultCatalog) return defaultCatalog;

  const catalog = parseExerciseCatalog(fs.readFileSync(filePath, 'utf8'), filePath);
  if (useDefault) defaultCatalog = catalog;
  return catalog;
}

/**
 * Validate a new exercise and append it to a catalog file.
 * Ids and names (case-insensitive) must be unique within the catalog.
 * @throws Error listing every problem; the file is left untouched
 */
export function addExercise(input: unknown, filePath: string = DEFAULT_CATALOG_PATH): Exercise {
  const parsed = exerciseSchema.safeParse(input);
  if (!parsed.success) throw invalid('exercise', describeIssues(parsed.error.issues));

  const exercise = parsed.data;
  const catalog = loadExerciseCatalog(filePath);
  const problems: string[] = [];
  if (catalog.some(e => e.id === exercise.id)) {
    problems.push(`id: Exercise id "${exercise.id}" already exists`);
  }
  if (catalog.some(e => e.name.toLowerCase() === exercise.name.toLowerCase())) {
    problems.push(`name: Exercise "${exercise.name}" already exists`);
  }
  if (problems.length > 0) throw invalid('exercise', problems);

  const updated = [...catalog, exercise];
  fs.writeFileSync(filePath, `${JSON.stringify(updated, null, 2)}\n`, 'utf8');
  if (filePath === DEFAULT_CATALOG_PATH) defaultCatalog = updated;

  console.log(`Added exercise ${exercise.id} to ${filePath}`);
  return exercise;
}

function matchesEquipment(exercise: Exercise, equipment: string): boolean {
  const wanted = equipment.trim().toLowerCase();
  const actual = exercise.equipment.trim().toLowerCase();
  if (BODYWEIGHT_EQUIPMENT.includes(wanted)) return BODYWEIGHT_EQUIPMENT.includes(actual);
  return actual.includes(wanted);
}

/**
 * Filter the catalog. Every given filter must match; the text query is a
 * case-insensitive substring match over name, goal, type and equipment.
 * Equipment matches as a case-insensitive substring, and "None" or
 * "Bodyweight" selects exercises that need no equipment.
 */
export function searchExercises(catalog: readonly Exercise[], filters: ExerciseFilters = {}): Exercise[] {
  const query = filters.query?.trim().toLowerCase() ?? '';

  return catalog.filter(exercise => {
    if (filters.injuryType && exercise.injuryType !== filters.injuryType) return false;
    if (filters.phase && exercise.phase !== filters.phase) return false;
    if (filters.type && exercise.type !== filters.type) return false;
    if (filters.equipment && !matchesEquipment(exercise, filters.equipment)) return false;
    if (!query) return true;
    return [exercise.name, exercise.goal, exercise.type, exercise.equipment]
      .some(text => text.toLowerCase().includes(query));
  });
}

/**
 * Recommend exercises for a patient's current phase.
 *
 * Falls back from (injury, phase) to (any injury, phase) to (injury, any phase).
 * Results are ordered by the phase's preferred exercise types.
 */
export function recommendExercises(
  catalog: readonly Exercise[],
  injuryType: string,
  phase: RehabPhase,
  limit = 6
): Exercise[] {
  const guidance = getPhaseGuidance(phase);
  const targetPhase = phase === 'Unclassified' ? 'Early' : phase;

  const tiers = [
    () => searchExercises(catalog, { injuryType, phase: targetPhase }),
    () => searchExercises(catalog, { phase: targetPhase }),
    () => searchExercises(catalog, { injuryType }),
  ];

  let matches: Exercise[] = [];
  for (const tier of tiers) {
    matches = tier();
    if (matches.length > 0) break;
  }

  const rank = (type: string) => {
    const index = guidance.exerciseTypes.indexOf(type);
    return index === -1 ? guidance.exerciseTypes.length : index;
  };

  return [...matches]
    .sort((a, b) => rank(a.type) - rank(b.type))
    .slice(0, Math.max(0, limit));
}
