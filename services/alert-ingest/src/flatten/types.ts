export type ScalarValue = string | number | boolean | null;

export type FlatAlertRecord = Readonly<Record<string, ScalarValue>>;

export type MetadataSection = Record<string, unknown>;

/**
 * Parsed `meta.yaml` document. Only the sections read by the flattener are typed;
 * anything else the alert framework adds is carried along untouched.
 */
export interface AlertMetadata {
  ALERT?: MetadataSection | null;
  EXTRA?: MetadataSection | null;
  HEADER?: MetadataSection | null;
  [section: string]: unknown;
}

export interface AlertInput {
  metadata: AlertMetadata;
  files: readonly string[];
}

/**
 * Copies the scalar fields of one section of the metadata document.
 */
export interface SectionRule {
  name: string;
  path: readonly string[];
  prefix?: string;
  allow?: ReadonlySet<string>;
}

/**
 * Computes extra fields from a section when that section is present.
 */
export interface DerivedSectionRule {
  name: string;
  path: readonly string[];
  derive: (section: MetadataSection) => Record<string, ScalarValue>;
}

/**
 * Applies to the flat record when `source` is present. `rename` moves the value,
 * `transform` rewrites it, `derive` adds fields computed from it and `drop` removes
 * keys once the rule has run.
 */
export interface CleaningRule {
  name: string;
  source: string;
  rename?: string;
  transform?: (value: ScalarValue) => ScalarValue;
  derive?: (value: ScalarValue, record: Readonly<Record<string, ScalarValue>>) => Record<string, ScalarValue | undefined>;
  drop?: readonly string[];
}

export interface FileRule {
  name: string;
  target: string;
  matches: (filePath: string) => boolean;
}

export interface FlattenRules {
  sections: readonly SectionRule[];
  derived: readonly DerivedSectionRule[];
  cleaning: readonly CleaningRule[];
  files: readonly FileRule[];
}

export function isMetadataSection(value: unknown): value is MetadataSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function isScalarValue(value: unknown): value is ScalarValue {
  return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}
