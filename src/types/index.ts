/**
 * @entry 공용 타입
 */

export { TRAIT_NAMES, EDUCATION_LEVELS } from './persona.js'

export type {
  TraitName,
  PersonalityTraits,
  EducationLevel,
  VoiceSettings,
  DocumentRef,
  PersonaRecord,
  PresetConfig,
  StoredPreset,
  TutorDraft,
} from './persona.js'
