export { parseTimestamp } from '@utils/time';
export { documentText, clampUnit } from './document-text';
