/**
 * @fileoverview Medical and diagnostic claims gate
 *
 * Text that reaches an intervention step must not carry diagnostic or
 * prescriptive language. Callers drop failing text; it is never rewritten.
 */

import { normalizeArabicText } from './text_normalize.js';

/** Arabic and English terms that mark medical or diagnostic language. */
export const FORBIDDEN_CLAIMS: readonly string[] = [
  'يعالج',
  'يشفي',
  'دواء',
  'علاج طبي',
  'تشخيص',
  'اضطراب',
  'مرض نفسي',
  'اكتئاب سريري',
  'فصام',
  'ثنائي القطب',
  'وصفة طبية',
  'diagnosis',
  'diagnose',
  'medication',
  'prescription',
  'clinical treatment',
  'medical treatment',
  'disorder',
  'mental illness',
  'clinical depression',
  'schizophrenia',
  'bipolar',
];

const NORMALIZED_FORBIDDEN = FORBIDDEN_CLAIMS.map(normalizeArabicText);

/**
 * True when the text carries no forbidden term, compared after
 * {@link normalizeArabicText} folding. Empty or missing text passes.
 */
export function validateNoMedicalClaims(text: string | null | undefined): boolean {
  if (!text) return true;
  const normalized = normalizeArabicText(text);
  if (!normalized) return true;
  return !NORMALIZED_FORBIDDEN.some((term) => normalized.includes(term));
}
