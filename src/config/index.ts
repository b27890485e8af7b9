/**
 * @entry Config 모듈
 *
 * YAML 설정 로드, 스키마 검증, 환경 변수 덮어쓰기
 */

export { loadConfig, getDefaultConfig, clearConfigCache, applyEnvOverrides, CONFIG_FILENAME } from './loadConfig.js'
export * from './schema.js'
