import seedFile from './verbs.json';
import { SeedFileSchema } from '../../shared/schemas/verb.schemas';
import type { VerbRecord } from '../../shared/types';

/**
 * Verbs bundled with the application, validated on load.
 */
export function loadSeedVerbs(): VerbRecord[] {
  return SeedFileSchema.parse(seedFile).verbs;
}
