import type { DialectCode, VerbRecord, VerbTense } from '../types/verb.types';
import { createWordBoundaryRegex } from './text-utils';

type Forms = Pick<
  VerbRecord,
  'base' | 'past' | 'participle' | 'pastUK' | 'pastUS' | 'participleUK' | 'participleUS'
>;

const DIALECT_LABELS: Record<DialectCode, string> = {
  'en-US': 'US',
  'en-UK': 'UK',
};

// BCP 47 locale a speech engine understands for each dialect
const DIALECT_LOCALES: Record<DialectCode, string> = {
  'en-US': 'en-US',
  'en-UK': 'en-GB',
};

export function isDialectCode(value: string): value is DialectCode {
  return value === 'en-US' || value === 'en-UK';
}

/**
 * Parse a dialect code, falling back to en-US for anything unknown.
 */
export function parseDialect(code: string): DialectCode {
  return isDialectCode(code) ? code : 'en-US';
}

export function dialectLabel(dialect: DialectCode): string {
  return DIALECT_LABELS[dialect];
}

export function dialectLocale(dialect: DialectCode): string {
  return DIALECT_LOCALES[dialect];
}

export function oppositeDialect(dialect: DialectCode): DialectCode {
  return dialect === 'en-US' ? 'en-UK' : 'en-US';
}

export function isVerbTense(value: string): value is VerbTense {
  return value === 'base' || value === 'past' || value === 'participle';
}

export function getPast(verb: Forms, dialect: DialectCode): string {
  const override = dialect === 'en-UK' ? verb.pastUK : verb.pastUS;
  return override || verb.past;
}

export function getParticiple(verb: Forms, dialect: DialectCode): string {
  const override = dialect === 'en-UK' ? verb.participleUK : verb.participleUS;
  return override || verb.participle;
}

export function getForm(verb: Forms, tense: VerbTense, dialect: DialectCode): string {
  switch (tense) {
    case 'base':
      return verb.base;
    case 'past':
      return getPast(verb, dialect);
    case 'participle':
      return getParticiple(verb, dialect);
  }
}

/**
 * True when UK and US spell the past or the participle differently.
 */
export function hasDialectVariants(verb: Forms): boolean {
  const differs = (uk: string, us: string) => uk !== '' && us !== '' && uk !== us;
  return differs(verb.pastUK, verb.pastUS) || differs(verb.participleUK, verb.participleUS);
}

/**
 * Every spelling of the verb, alternatives ("was/were") split out,
 * deduplicated in first-seen order.
 */
export function allForms(verb: Forms): string[] {
  const split = (form: string) =>
    form === '' ? [] : form.split('/').map((f) => f.trim()).filter(Boolean);

  const forms = [
    verb.base,
    ...split(verb.past),
    ...split(verb.participle),
    ...split(verb.pastUK),
    ...split(verb.pastUS),
    ...split(verb.participleUK),
    ...split(verb.participleUS),
  ];

  return [...new Set(forms)];
}

/**
 * Wrap whole-word occurrences of any form in `**`, case-insensitively.
 */
export function highlightExample(example: string, forms: string[]): string {
  let result = example;
  for (const form of new Set(forms)) {
    if (!form) continue;
    result = result.replace(createWordBoundaryRegex(form), (match) => `**${match}**`);
  }
  return result;
}
