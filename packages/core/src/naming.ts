import { LABEL_VOCABULARY } from './catalog/index.js';
import { lookup } from './util.js';

const { abbreviations, phrases } = LABEL_VOCABULARY;

/**
 * `BankAccount` -> `bank_account`. Already-snake input passes through.
 */
export function toSnake(name: string): string {
  return name.replace(/(?!^)([A-Z])/g, '_$1').toLowerCase();
}

/**
 * `lease_type` -> `LeaseType`, `cam_terms` -> `CAMTerms`. PascalCase input
 * is snake-cased first so `BankAccount` stays `BankAccount`.
 */
export function toPascal(name: string): string {
  return toSnake(name)
    .split('_')
    .map((part) => {
      if (!part) {
        return part;
      }
      return (
        lookup(abbreviations, part) ?? part[0].toUpperCase() + part.slice(1)
      );
    })
    .join('');
}

/**
 * `pending_approval` -> `pending-approval`.
 */
export function toKebab(name: string): string {
  return toSnake(name).replace(/_/g, '-');
}

/**
 * Human label for an identifier: known phrases first, then word by word
 * with known abbreviations upper-cased.
 *
 * @example
 * generateLabel('section_8')       // 'Section 8'
 * generateLabel('commercial_nnn')  // 'Commercial NNN'
 */
export function generateLabel(value: string): string {
  if (!value) {
    return '';
  }

  const phrase = lookup(phrases, value);
  if (phrase !== undefined) {
    return phrase;
  }

  return value
    .split('_')
    .map((part) => {
      if (!part) {
        return part;
      }
      return (
        lookup(abbreviations, part.toLowerCase()) ??
        part[0].toUpperCase() + part.slice(1)
      );
    })
    .join(' ');
}

/**
 * Label for a field. Entity references drop their `_id`/`_ids` suffix and
 * nested paths (`term.end`) read as separate words.
 */
export function fieldLabel(name: string, isEntityRef = false): string {
  let clean = name.replace(/\./g, '_');
  if (isEntityRef) {
    clean = clean.replace(/_ids$/, '').replace(/_id$/, '');
  }
  return generateLabel(clean);
}

/**
 * The field name with a trailing `_id` or `_ids` removed, or undefined when
 * it has neither.
 */
export function stripReferenceSuffix(
  name: string
): { prefix: string; plural: boolean } | undefined {
  if (name.endsWith('_ids')) {
    return { prefix: name.slice(0, -'_ids'.length), plural: true };
  }
  if (name.endsWith('_id')) {
    return { prefix: name.slice(0, -'_id'.length), plural: false };
  }
  return undefined;
}
