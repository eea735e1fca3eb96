export { RelationGraphService } from './relation-graph.service';
export type { SymmetryViolation } from './relation-graph.service';
export {
  scoreOutcome,
  applyProficiencyDelta,
  recordReview,
  isSpellingMatch,
  normalizeSpelling,
} from './scoring.service';
export type { ScoringDeltas } from './scoring.service';
export { sortedEntries } from './word-sort.service';
export {
  StudySessionService,
  FILL_IN_FALLBACK_PROMPT,
  CHOICE_FALLBACK_PROMPTS,
} from './study-session.service';
export type { StudySessionDeps } from './study-session.service';
export { WordEditorService } from './word-editor.service';
export type { WordEditorDeps } from './word-editor.service';
export { WordListService, SAMPLE_WORDS } from './word-list.service';
export type { WordListDeps } from './word-list.service';
