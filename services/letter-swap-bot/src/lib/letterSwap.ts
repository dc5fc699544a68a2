/**
 * Замена кириллических букв на латинские двойники.
 * Каждая подходящая буква меняется независимо с шансом 50%.
 */

export const REPLACEMENT_MAP: Readonly<Record<string, string>> = {
  'а': 'a', 'е': 'e', 'с': 'c', 'о': 'o',
  'р': 'p', 'х': 'x', 'у': 'y',
  'А': 'A', 'Е': 'E', 'С': 'C', 'О': 'O',
  'Р': 'P', 'Х': 'X', 'У': 'Y',
};

export const TOO_LONG_TEXT = 'Слишком длинный текст, попробуйте покороче';

/** Возвращает число из [0, 1), как Math.random */
export type RandomSource = () => number;

export function replaceLetters(text: string, random: RandomSource = Math.random): string {
  let result = '';
  for (const char of text) {
    const replacement = REPLACEMENT_MAP[char];
    result += replacement !== undefined && random() < 0.5 ? replacement : char;
  }
  return result;
}

export function processText(text: string, maxLength: number, random: RandomSource = Math.random): string {
  if (text.length > maxLength) return TOO_LONG_TEXT;
  return replaceLetters(text, random);
}
