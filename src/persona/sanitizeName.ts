/**
 * 페르소나 이름을 파일 이름이나 키로 쓸 수 있는 형태로 정리한다
 *
 * - 글자(한글 포함), 숫자, 공백, `_`, `-` 이외의 문자 제거
 * - 공백 / `_` / `-` 의 연속은 `_` 하나로
 * - 앞뒤 `_` 제거
 *
 * sanitizeName(sanitizeName(x)) === sanitizeName(x)
 */
export function sanitizeName(raw: string): string {
  return raw
    .replace(/[^\p{L}\p{N}\s_-]/gu, '')
    .replace(/[\s_-]+/g, '_')
    .replace(/^_+|_+$/g, '')
}
