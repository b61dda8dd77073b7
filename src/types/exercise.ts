import type { RehabPhase } from './rehab';

/** Exercise catalog entry */
export interface Exercise {
  id: string;
  injuryType: string;
  phase: RehabPhase;
  name: string;
  type: string;          // e.g. 'Isometric', 'Strength', 'Plyometric'
  goal: string;
  equipment: string;
  progression: string;
}

/** Search filters; every given filter must match */
export interface ExerciseFilters {
  query?: string;
  injuryType?: string;
  phase?: RehabPhase;
  type?: string;
  equipment?: string;    // substring; 'None' means bodyweight only
}
