export { flattenAlert } from './flattener';
export { DEFAULT_FLATTEN_RULES, HEADER_ALLOW_LIST, farToYears } from './rules';
export { parseAlertTimestamp, parseEventTimestamp, secondsBetween } from './timestamps';
export * from './types';
