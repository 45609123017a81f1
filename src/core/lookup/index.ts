export { createLookup } from './lookup.js';
export {
  ABSENCE_CALLS,
  matchesAbsence,
  matchesSignature,
  mergeAbsenceTables,
} from './absence.js';
export type { AbsenceCall, AbsenceSignature, AbsenceSignatures, AbsenceTable } from './absence.js';
export type { Lookup, LookupOptions, LookupResult } from './types.js';
