import { AlertMetadataError } from '../errors';
import { DEFAULT_FLATTEN_RULES } from './rules';
import {
  isMetadataSection,
  isScalarValue,
  type AlertInput,
  type AlertMetadata,
  type FlatAlertRecord,
  type FlattenRules,
  type MetadataSection,
  type ScalarValue
} from './types';

function resolveSection(metadata: AlertMetadata, path: readonly string[]): MetadataSection | null {
  let current: unknown = metadata;
  for (const segment of path) {
    if (!isMetadataSection(current)) {
      return null;
    }
    current = current[segment];
    if (!isMetadataSection(current) || Object.keys(current).length === 0) {
      return null;
    }
  }
  return isMetadataSection(current) ? current : null;
}

function snapshot(fields: Map<string, ScalarValue>): Record<string, ScalarValue> {
  return Object.fromEntries(fields);
}

/**
 * Flattens an alert's metadata document and generated file list into a single record
 * of lower-cased keys and scalar values. Keys are sorted so the result does not depend
 * on the order fields appear in the source document.
 */
export function flattenAlert(input: AlertInput, rules: FlattenRules = DEFAULT_FLATTEN_RULES): FlatAlertRecord {
  if (!isMetadataSection(input.metadata.ALERT)) {
    throw new AlertMetadataError('ALERT', 'section is missing or not a mapping');
  }
  const fields = new Map<string, ScalarValue>();

  for (const rule of rules.sections) {
    const section = resolveSection(input.metadata, rule.path);
    if (!section) {
      continue;
    }
    for (const [key, value] of Object.entries(section)) {
      if (!isScalarValue(value)) {
        continue;
      }
      if (rule.allow && !rule.allow.has(key.toLowerCase())) {
        continue;
      }
      fields.set(`${rule.prefix ?? ''}${key}`.toLowerCase(), value);
    }
  }

  for (const rule of rules.derived) {
    const section = resolveSection(input.metadata, rule.path);
    if (!section) {
      continue;
    }
    for (const [key, value] of Object.entries(rule.derive(section))) {
      fields.set(key, value);
    }
  }

  for (const rule of rules.cleaning) {
    if (!fields.has(rule.source)) {
      continue;
    }
    const original = fields.get(rule.source) ?? null;
    const value = rule.transform ? rule.transform(original) : original;
    if (rule.rename) {
      fields.delete(rule.source);
    }
    fields.set(rule.rename ?? rule.source, value);
    if (rule.derive) {
      for (const [key, derived] of Object.entries(rule.derive(value, snapshot(fields)))) {
        if (derived !== undefined) {
          fields.set(key, derived);
        }
      }
    }
    for (const key of rule.drop ?? []) {
      fields.delete(key);
    }
  }

  for (const filePath of input.files) {
    for (const rule of rules.files) {
      if (rule.matches(filePath)) {
        fields.set(rule.target, filePath);
      }
    }
  }

  const sorted = [...fields.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return Object.freeze(Object.fromEntries(sorted));
}
