/**
 * Injury-Specific Thresholds - The "Clinical" Brain
 *
 * Static gate values each built-in threshold table is generated from.
 * This is the one place injury types are declared: the engine, the CLI
 * and the HTML forms all read their option lists from here.
 */

import type { InjuryThresholdDefinition, MetricField, MetricFieldSpec } from '@/types';

/**
 * Master threshold dictionary, in display order.
 *
 * Each injury has three progression gates:
 * - earlyToMid: minimum LSI/RFD and maximum pain to leave Early
 * - midToLate: ... to leave Mid
 * - lateToReturn: ... to reach Return to Sport
 *
 * LSI and RFD are percentages (RFD relative to baseline/uninjured limb).
 */
export const INJURY_THRESHOLD_DEFINITIONS: InjuryThresholdDefinition[] = [
  {
    injuryType: 'ACL',
    displayName: 'Anterior Cruciate Ligament',
    description: 'ACL rupture or reconstruction',
    gates: {
      earlyToMid: { lsi: 70, rfd: 60, pain: 4 },
      midToLate: { lsi: 85, rfd: 80, pain: 2 },
      lateToReturn: { lsi: 90, rfd: 90, pain: 1 },
    },
  },
  {
    injuryType: 'Achilles',
    displayName: 'Achilles Tendon',
    description: 'Achilles tendon injury or surgical repair',
    gates: {
      earlyToMid: { lsi: 65, rfd: 50, pain: 5 },
      midToLate: { lsi: 80, rfd: 75, pain: 3 },
      lateToReturn: { lsi: 90, rfd: 85, pain: 1 },
    },
  },
  {
    injuryType: 'Hamstring',
    displayName: 'Hamstring Strain',
    description: 'Hamstring strain or tear',
    gates: {
      earlyToMid: { lsi: 75, rfd: 65, pain: 4 },
      midToLate: { lsi: 85, rfd: 80, pain: 2 },
      lateToReturn: { lsi: 90, rfd: 90, pain: 1 },
    },
  },
  {
    injuryType: 'Patellar Tendon',
    displayName: 'Patellar Tendon',
    description: 'Patellar tendinopathy or rupture',
    gates: {
      earlyToMid: { lsi: 70, rfd: 55, pain: 4 },
      midToLate: { lsi: 85, rfd: 75, pain: 2 },
      lateToReturn: { lsi: 90, rfd: 85, pain: 1 },
    },
  },
  {
    injuryType: 'Rotator Cuff',
    displayName: 'Rotator Cuff',
    description: 'Rotator cuff tear or repair',
    gates: {
      earlyToMid: { lsi: 65, rfd: 50, pain: 5 },
      midToLate: { lsi: 80, rfd: 70, pain: 3 },
      lateToReturn: { lsi: 85, rfd: 80, pain: 1 },
    },
  },
  {
    injuryType: 'Groin',
    displayName: 'Groin / Adductor',
    description: 'Groin or adductor strain',
    gates: {
      earlyToMid: { lsi: 70, rfd: 60, pain: 4 },
      midToLate: { lsi: 85, rfd: 80, pain: 2 },
      lateToReturn: { lsi: 90, rfd: 85, pain: 1 },
    },
  },
  {
    injuryType: 'Proximal Hamstring Tendinopathy',
    displayName: 'Proximal Hamstring Tendinopathy',
    description: 'High hamstring tendinopathy',
    gates: {
      earlyToMid: { lsi: 70, rfd: 60, pain: 5 },
      midToLate: { lsi: 80, rfd: 75, pain: 3 },
      lateToReturn: { lsi: 90, rfd: 85, pain: 1 },
    },
  },
  {
    injuryType: 'ATFL Ligament Injury',
    displayName: 'ATFL Ligament Injury',
    description: 'Lateral ankle ligament sprain',
    gates: {
      earlyToMid: { lsi: 75, rfd: 65, pain: 4 },
      midToLate: { lsi: 85, rfd: 80, pain: 2 },
      lateToReturn: { lsi: 90, rfd: 90, pain: 1 },
    },
  },
  {
    injuryType: 'Generic',
    displayName: 'General Injury',
    description: 'Any injury without a specific protocol (ACL gates)',
    gates: {
      earlyToMid: { lsi: 70, rfd: 60, pain: 4 },
      midToLate: { lsi: 85, rfd: 80, pain: 2 },
      lateToReturn: { lsi: 90, rfd: 90, pain: 1 },
    },
  },
];

/**
 * Metric field specs, in form/validation order.
 * Ranges are inclusive.
 */
export const METRIC_FIELD_SPECS: Record<MetricField, MetricFieldSpec> = {
  limbSymmetryIndex: { label: 'LSI', unit: '%', min: 0, max: 200, integer: false, cliFlag: 'lsi' },
  painScore: { label: 'Pain', unit: '/10', min: 0, max: 10, integer: true, cliFlag: 'pain' },
  rateOfForceDevelopment: { label: 'RFD', unit: '%', min: 0, max: 200, integer: false, cliFlag: 'rfd' },
  peakForce: { label: 'Peak force', unit: 'N', min: 0, max: null, integer: false, cliFlag: 'peak-force' },
  leftLimbForce: { label: 'Left limb', unit: 'N', min: 0, max: null, integer: false, cliFlag: 'left' },
  rightLimbForce: { label: 'Right limb', unit: 'N', min: 0, max: null, integer: false, cliFlag: 'right' },
  daysSinceInjury: { label: 'Days since injury', unit: 'd', min: 0, max: null, integer: true, cliFlag: 'days-since-injury' },
  daysSinceSurgery: { label: 'Days since surgery', unit: 'd', min: 0, max: null, integer: true, cliFlag: 'days-since-surgery' },
  rangeOfMotion: { label: 'ROM', unit: '°', min: 0, max: 180, integer: false, cliFlag: 'rom' },
  swellingGrade: { label: 'Swelling', unit: '', min: 0, max: 4, integer: true, cliFlag: 'swelling' },
};

/** Declaration order: validation messages and reports follow it */
export const METRIC_FIELDS: MetricField[] = [
  'limbSymmetryIndex',
  'painScore',
  'rateOfForceDevelopment',
  'peakForce',
  'leftLimbForce',
  'rightLimbForce',
  'daysSinceInjury',
  'daysSinceSurgery',
  'rangeOfMotion',
  'swellingGrade',
];

/** Fields every threshold table must require */
export const CORE_REQUIRED_FIELDS: MetricField[] = ['limbSymmetryIndex', 'painScore'];

/**
 * Constants for injury-independent alert thresholds
 */
export const ALERT_THRESHOLDS = {
  HIGH_PAIN: 7,                   // pain >= 7 is high
  SEVERE_ASYMMETRY_LSI: 70,       // LSI < 70 is marked asymmetry
  SWELLING_GRADE: 2,              // swelling grade >= 2 needs load reduction
  PERSISTENT_PAIN: 2,             // pain > 2 once strength is advanced
  LIMB_DOMINANCE_REVERSED_LSI: 110, // LSI > 110 suggests swapped limbs
  REINJURY_TARGET_LSI: 90,        // Late/RTS patients below this carry re-injury risk
};

/** Units every built-in table reports RFD in */
export const DEFAULT_RFD_UNIT = '% of baseline';
