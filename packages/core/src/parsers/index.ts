export { parseDate, parseDeadline, formatDate, addDays } from './date-parser.js';
export { parseSearchFilters } from './search-filter-parser.js';
export type { SearchFilters } from './search-filter-parser.js';
