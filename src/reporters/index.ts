export { formatTextReport, createColors, formatDuration, type Colors } from './text.js';
export { formatJsonReport } from './json.js';
export { formatJUnitReport } from './junit.js';
