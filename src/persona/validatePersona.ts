import { collectIssues, personaRecordSchema, type ValidationResult } from '../preset/schema.js'

/**
 * 저장 전에 전체 레코드를 검사한다. 첫 번째 위반에서 멈추지 않고 모두 모은다.
 */
export function validatePersona(record: unknown): ValidationResult {
  return collectIssues(personaRecordSchema, record)
}
