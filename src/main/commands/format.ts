import type { DialectCode, FailureLike, UserPreferences, VerbRecord } from '../../shared/types';
import { shouldShowDetails } from '../utils/failures';
import { allForms, dialectLabel, getParticiple, getPast, hasDialectVariants, highlightExample } from '../../shared/utils/verb-forms';

export function formatVerbLine(verb: VerbRecord, dialect: DialectCode): string {
  return `${verb.base} - ${getPast(verb, dialect)} - ${getParticiple(verb, dialect)}  (${verb.id})`;
}

export function formatVerbDetail(verb: VerbRecord, dialect: DialectCode): string[] {
  const lines = [`${verb.base} - ${getPast(verb, dialect)} - ${getParticiple(verb, dialect)} [${dialectLabel(dialect)}]`];

  if (hasDialectVariants(verb)) {
    lines.push(`  UK: ${getPast(verb, 'en-UK')} - ${getParticiple(verb, 'en-UK')}`);
    lines.push(`  US: ${getPast(verb, 'en-US')} - ${getParticiple(verb, 'en-US')}`);
  }

  const pronunciation = dialect === 'en-UK' ? verb.pronunciationTextUK : verb.pronunciationTextUS;
  if (pronunciation) {
    lines.push(`  /${pronunciation}/`);
  }

  const forms = allForms(verb);
  verb.meanings.forEach((meaning, index) => {
    const register = meaning.register ? `, ${meaning.register}` : '';
    lines.push('');
    lines.push(`${index + 1}. (${meaning.partOfSpeech}${register}) ${meaning.definition}`);
    for (const example of meaning.examples) {
      lines.push(`   - ${highlightExample(example, forms)}`);
    }
    for (const usage of meaning.contextualUsages) {
      lines.push(`   [${usage.context}] ${usage.description}`);
      for (const example of usage.examples) {
        lines.push(`     - ${highlightExample(example, forms)}`);
      }
    }
  });

  return lines;
}

export function formatPreferences(preferences: UserPreferences): string[] {
  return [
    `dialect: ${preferences.dialect}`,
    `dark mode: ${preferences.isDarkMode ? 'on' : 'off'}`,
    `premium: ${preferences.isPremium ? 'yes' : 'no'}`,
  ];
}

export function formatFailure(failure: FailureLike): string {
  const showDetails = failure.details && shouldShowDetails(failure);
  return showDetails ? `Error: ${failure.message} (${failure.details})` : `Error: ${failure.message}`;
}
