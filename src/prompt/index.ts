export {
  TRAIT_THRESHOLDS,
  buildLessonMessage,
  composeLessonRequest,
  composeSystemPrompt,
  type LessonRequest,
} from './composePrompt.js'
