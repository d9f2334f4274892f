/**
 * @fileoverview Arabic-aware text folding for matching
 *
 * Used wherever labels, goals and claims are compared as substrings. Both
 * sides of a comparison must go through the same folding.
 */

const COMBINING_MARKS = /\p{M}/gu;
const TATWEEL = /ـ/g;
const ALEF_VARIANTS = /[آأإٱ]/g;
const YEH_VARIANTS = /[ىی]/g;
const ARABIC_INDIC_DIGITS = /[٠-٩۰-۹]/g;

const toWesternDigit = (digit: string): string => {
  const code = digit.charCodeAt(0);
  return String(code >= 0x06f0 ? code - 0x06f0 : code - 0x0660);
};

/**
 * Unicode decomposition with combining marks removed (harakat, hamza
 * carriers, Latin accents), tatweel removed, alef and yeh variants unified,
 * Arabic-Indic digits mapped to ASCII, lowercased, whitespace collapsed.
 */
export function normalizeArabicText(text: string): string {
  return text
    .normalize('NFD')
    .replace(COMBINING_MARKS, '')
    .replace(TATWEEL, '')
    .replace(ALEF_VARIANTS, 'ا')
    .replace(YEH_VARIANTS, 'ي')
    .replace(ARABIC_INDIC_DIGITS, toWesternDigit)
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}
