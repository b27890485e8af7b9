/**
 * 칠판 서식 태그, 마크다운, 수식 구분자, 화면용 이모지를 지워 읽을 수 있는 문장만 남긴다
 */

const COLOR_TAGS = ['RED', 'BLUE', 'GREEN', 'CIRCLE'] as const

/** 화면 아이콘으로만 쓰는 이모지. ZWJ(U+200D) 와 VS16(U+FE0F) 도 함께 지운다. */
const UI_EMOJI =
  /[\u{1F4CB}\u{1F393}\u{1F468}\u200D\u{1F3EB}\u{1F50A}\u{1F4AC}\u2699\uFE0F\u{1F4DD}\u{1F3AF}\u{1F4BE}\u{1F3E0}\u{1F5D1}\u{1F3A4}]/gu

export function cleanTextForSpeech(text: string): string {
  let cleaned = text
  for (const tag of COLOR_TAGS) {
    cleaned = cleaned.replace(new RegExp(`\\[${tag}\\]([^[]+)\\[/${tag}\\]`, 'g'), '$1')
  }

  return cleaned
    .replace(/\*\*([^*]+)\*\*/g, '$1')
    .replace(/##\s*([^\n]+)/g, '$1')
    .replace(/#\s*([^\n]+)/g, '$1')
    .replace(/\$([^$]+)\$/g, '$1')
    .replace(UI_EMOJI, '')
    .replace(/\s+/g, ' ')
    .trim()
}
