// C0 controls except tab, LF and CR, plus DEL and the C1 block.
const DISALLOWED_CONTROL = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F-\u009F]/u;

/** Symbols engines read aloud badly or choke on ("*", "#", emoji, markup). */
const UNSPEAKABLE = /[^\p{L}\p{M}\p{N}\s.,!?;:'"()\-]/gu;

export function findControlCharacter(text: string): { index: number; codePoint: number } | undefined {
  const match = DISALLOWED_CONTROL.exec(text);
  if (!match) return undefined;
  return { index: match.index, codePoint: match[0].codePointAt(0) ?? 0 };
}

/** Length in code points, so accented and astral characters count once. */
export function textLength(text: string): number {
  return Array.from(text).length;
}

/**
 * Prepare text for an engine: NFC, drop unspeakable symbols, collapse
 * whitespace. "Olá! Teste." passes through unchanged.
 */
export function normalizeTtsText(text: string): string {
  return text.normalize('NFC').replace(UNSPEAKABLE, ' ').replace(/\s+/g, ' ').trim();
}
