export {
  loadExerciseCatalog,
  addExercise,
  parseExerciseCatalog,
  searchExercises,
  recommendExercises,
  DEFAULT_CATALOG_PATH,
} from './catalog';

export { getPhaseGuidance } from '@/constants/phase-guidance';
