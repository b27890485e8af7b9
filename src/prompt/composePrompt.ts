/**
 * 튜터 프롬프트 조립
 *
 * 같은 페르소나면 항상 같은 문자열을 만든다 (시간, 난수 없음).
 */

import { TRAIT_NAMES } from '../types/persona.js'
import { LEVEL_LABELS, TRAIT_LABELS } from '../persona/ranges.js'
import type { PersonaRecord, PersonalityTraits } from '../types/persona.js'

/** 칠판 / 음성 출력 규칙. 태그는 음성 변환 전에 cleanTextForSpeech 가 지운다. */
const FORMATTING_RULES = [
  '중요한 규칙:',
  '1. 학생과의 대화에서는 항상 교육적이고 도움이 되도록 답변하세요.',
  '2. 칠판에 쓸 내용이 있다면 다음 형식을 사용하세요:',
  '   - 제목: ## 제목',
  '   - 중요한 내용: **내용** 또는 [RED]내용[/RED]',
  '   - 수식: $수식$ 또는 [BLUE]$수식$[/BLUE]',
  '   - 강조할 부분: [CIRCLE]내용[/CIRCLE]',
  '   - 색상 구분: [RED], [BLUE], [GREEN] 태그 사용',
  '3. 음성으로 읽힐 내용이므로 자연스럽고 말하기 쉬운 문장으로 구성하세요.',
  '4. 학생의 수준에 맞는 어휘와 설명을 사용하세요.',
  '5. 안전과 관련된 내용은 반드시 강조해서 설명하세요.',
]

export const TRAIT_THRESHOLDS = {
  warm: 70,
  strict: 30,
  humor: 60,
  naturalSpeech: 60,
  practice: 60,
} as const

function personalityGuidance(traits: PersonalityTraits): string[] {
  const lines: string[] = []

  if (traits.friendliness > TRAIT_THRESHOLDS.warm) {
    lines.push('- 친근하고 따뜻한 말투로 대화하세요. 학생을 격려하고 응원해주세요.')
  } else if (traits.friendliness < TRAIT_THRESHOLDS.strict) {
    lines.push('- 전문적이고 엄격한 태도를 유지하세요. 정확한 정보 전달에 집중하세요.')
  }

  if (traits.humor_level > TRAIT_THRESHOLDS.humor) {
    lines.push('- 적절한 유머와 재미있는 예시를 사용해서 학습을 즐겁게 만드세요.')
  }

  if (traits.natural_speech > TRAIT_THRESHOLDS.naturalSpeech) {
    lines.push(
      "- 실제 선생님처럼 자연스럽게 말하세요. 가끔 '음...', '그러니까', '잠깐만요' 같은 자연스러운 표현을 사용하세요."
    )
  }

  if (traits.theory_vs_practice > TRAIT_THRESHOLDS.practice) {
    lines.push('- 실험이나 실습 위주로 설명하고, 직접 해볼 수 있는 활동을 제안하세요.')
  } else {
    lines.push('- 이론적 배경과 원리를 중심으로 체계적으로 설명하세요.')
  }

  return lines
}

export function composeSystemPrompt(persona: PersonaRecord): string {
  const { personality } = persona
  const lines = [
    `당신은 ${persona.name}이라는 이름의 AI 튜터입니다.`,
    `${persona.subject} 분야의 전문가이며, ${LEVEL_LABELS[persona.level]} 수준의 학생들을 가르칩니다.`,
    '',
    '당신의 성격과 특성:',
  ]

  for (const trait of TRAIT_NAMES) {
    const { label, scale } = TRAIT_LABELS[trait]
    lines.push(`- ${label}: ${personality[trait]}/100 (${scale})`)
  }

  lines.push('', ...FORMATTING_RULES, '', ...personalityGuidance(personality))
  return lines.join('\n')
}

/** 5단계 수업 요청문 */
export function buildLessonMessage(topic: string): string {
  return [
    `'${topic}'에 대한 수업을 진행해주세요. 다음과 같이 구성해주세요:`,
    '',
    '1. 주제 소개와 학습 목표',
    '2. 주요 개념 설명 (칠판에 정리할 내용 포함)',
    '3. 실제 예시나 실험 (가능한 경우)',
    '4. 중요 포인트 정리',
    '5. 학생들에게 질문 던지기',
    '',
    '칠판에 쓸 내용은 반드시 포맷팅 태그를 사용해주세요.',
  ].join('\n')
}

export interface LessonRequest {
  systemPrompt: string
  message: string
}

export function composeLessonRequest(topic: string, persona: PersonaRecord): LessonRequest {
  return {
    systemPrompt: composeSystemPrompt(persona),
    message: buildLessonMessage(topic),
  }
}
