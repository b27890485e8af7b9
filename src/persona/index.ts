/**
 * Persona 모듈
 */

export {
  PERSONA_SCHEMA_VERSION,
  assemblePersona,
  draftToPersona,
  getDefaultDraft,
  toDraft,
  type CoreSettings,
  type DocumentSettings,
  type IdentitySettings,
  type PersonalitySettings,
  type SpecialtySettings,
  type StyleSettings,
} from './buildPersona.js'
export { validatePersona } from './validatePersona.js'
export { sanitizeName } from './sanitizeName.js'
export {
  LEVEL_LABELS,
  PERSONALITY_DEFAULTS,
  SUBJECTS,
  TRAIT_LABELS,
  TRAIT_RANGE,
  VOICE_DEFAULTS,
  VOICE_RANGES,
  isEducationLevel,
  normalizeLevel,
  type NumericRange,
} from './ranges.js'
