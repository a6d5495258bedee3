/**
 * Prompts for the generation backend (Korean output)
 */

export function buildSummaryPrompt(text: string, titleHint?: string): string {
  const title = titleHint?.trim() ? `제목: ${titleHint.trim()}\n\n` : '';

  return `다음은 암호화폐/크립토 산업 관련 기사입니다.
이 내용을 한국어로 정확히 3줄로 요약해주세요.

규칙:
- 각 줄은 한 문장으로, 핵심 정보만 간결하게 담아주세요.
- 각 줄은 내용에 맞는 이모지 하나로 시작해주세요. (예: 📈, 🏦, ⚠️)
- 비트코인, 이더리움, 디파이, 스테이킹 같은 업계 용어와 고유명사, 티커(BTC, ETH 등)는 원문 표기를 유지해도 됩니다.
- 요약 외의 설명이나 머리말은 쓰지 마세요.

${title}기사 내용:
${text}

3줄 요약:`;
}

export function buildTranslationPrompt(text: string): string {
  return `다음 텔레그램 메시지를 자연스러운 한국어로 번역해주세요.

규칙:
- 크립토/업계 용어(DeFi, TVL, staking, airdrop, L2, ETF, mainnet, testnet 등), 프로젝트명, 티커(BTC, ETH, SOL 등)는 번역하지 말고 원문 그대로 두세요.
- 링크(URL), 숫자, 날짜는 그대로 유지하세요.
- 번역문만 출력하고 설명은 덧붙이지 마세요.

메시지:
${text}

번역:`;
}
