import type { PhaseGuidance, RehabPhase, RulePhase } from '@/types';

/** Clinician-facing summary shown with each phase result */
export const PHASE_MESSAGES: Record<RehabPhase, string> = {
  'Return to Sport': 'Metrics meet return-to-sport criteria. Ready for sport-specific training and a return-to-play assessment.',
  'Late': 'Advanced phase. Introduce sport-specific movements and power development.',
  'Mid': 'Progressing well. Continue progressive loading and functional strengthening.',
  'Early': 'Early phase. Focus on pain management, range of motion and foundational strengthening.',
  'Unclassified': 'Insufficient data to place the patient in a phase. Record RFD or re-test before progressing.',
};

/** Phase order, least to most advanced */
export const PHASE_ORDER: RulePhase[] = ['Early', 'Mid', 'Late', 'Return to Sport'];

/**
 * Focus areas and preferred exercise types per phase.
 * exerciseTypes order is the recommendation priority.
 */
export const PHASE_GUIDANCE: Record<RulePhase, PhaseGuidance> = {
  'Early': {
    focus: ['Pain management', 'Range of motion', 'Basic strengthening'],
    exerciseTypes: ['Mobility', 'Isometric', 'Light Strength'],
    avoid: ['Plyometric', 'High-intensity movements'],
  },
  'Mid': {
    focus: ['Progressive strengthening', 'Functional movement', 'Endurance'],
    exerciseTypes: ['Strength', 'Mobility', 'Neuromuscular'],
    avoid: ['High-impact plyometrics'],
  },
  'Late': {
    focus: ['Sport-specific strength', 'Power development', 'Movement quality'],
    exerciseTypes: ['Strength', 'Plyometric', 'Neuromuscular'],
    avoid: ['Excessive volume without recovery'],
  },
  'Return to Sport': {
    focus: ['Sport-specific training', 'Reactive strength', 'Competition preparation'],
    exerciseTypes: ['Plyometric', 'Neuromuscular', 'Sport-specific'],
    avoid: ['Deconditioning'],
  },
};

/**
 * Get guidance for a phase. Unclassified falls back to Early.
 */
export function getPhaseGuidance(phase: RehabPhase): PhaseGuidance {
  return phase === 'Unclassified' ? PHASE_GUIDANCE.Early : PHASE_GUIDANCE[phase];
}
