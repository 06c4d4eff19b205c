import type { LvkSettings } from '../config/settings';

export type EventKind = 'mock' | 'real';

export type SignificancePartition = 'all' | 'low' | 'high';

export interface EventKindConfig {
  kind: EventKind;
  setting: keyof Pick<LvkSettings, 'parseMockEvents' | 'parseRealEvents'>;
  directory: string;
  idPrefix: string;
}

export interface SignificancePartitionConfig {
  partition: SignificancePartition;
  subdirectory: string | null;
  significant: 0 | 1 | null;
}

export const LOW_SIGNIFICANCE_DIR = '_low_significance';
export const HIGH_SIGNIFICANCE_DIR = '_high_significance';

export const EVENT_KINDS: readonly EventKindConfig[] = [
  { kind: 'mock', setting: 'parseMockEvents', directory: 'mockevents', idPrefix: 'M' },
  { kind: 'real', setting: 'parseRealEvents', directory: 'superevents', idPrefix: 'S' }
];

export const SIGNIFICANCE_PARTITIONS: readonly SignificancePartitionConfig[] = [
  { partition: 'all', subdirectory: null, significant: null },
  { partition: 'low', subdirectory: LOW_SIGNIFICANCE_DIR, significant: 0 },
  { partition: 'high', subdirectory: HIGH_SIGNIFICANCE_DIR, significant: 1 }
];
