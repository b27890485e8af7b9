/**
 * Preset 모듈
 */

export {
  PresetCatalog,
  PRESET_EXPORT_VERSION,
  type PersonalityProfile,
  type PresetExport,
  type PresetsByOrigin,
} from './PresetCatalog.js'
export { BUILTIN_PRESETS } from './builtinPresets.js'
export {
  REQUIRED_PRESET_TRAITS,
  collectIssues,
  personaRecordSchema,
  presetConfigSchema,
  validatePresetConfig,
  type ValidationResult,
} from './schema.js'
