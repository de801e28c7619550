export { keyMatch, segmentMatch, exactMatch, getMatcher } from './pattern-matching';
export type { Matcher } from './pattern-matching';
