/**
 * Parses GitHub-style search filter strings into structured filters.
 * Tokens like `priority:high type:work has:deadline sort:deadline` are
 * extracted; remaining text becomes the name query for LIKE matching.
 *
 * Descending sort: prefix the field with `-` (e.g. `sort:-priority`).
 * ID filter: `id:42` matches a single task.
 */

import type { Priority } from '../types/priority.js';
import { Priority as P } from '../types/priority.js';
import type { TaskType } from '../types/task-type.js';
import { TaskType as T } from '../types/task-type.js';
import type { TaskSort, TaskSortField } from '../queries/task-queries.js';
import { parseDate } from './date-parser.js';

export interface SearchFilters {
  nameQuery: string;
  priority: Priority | null;
  taskType: TaskType | null;
  /** yyyy-MM-dd */
  date: string | null;
  /** true: has:deadline, false: no:deadline */
  hasDeadline: boolean | null;
  sort: TaskSort | null;
  id: number | null;
}

const PRIORITY_MAP: Record<string, Priority> = {
  high: P.High,
  p1: P.High,
  medium: P.Medium,
  p2: P.Medium,
  low: P.Low,
  p3: P.Low,
};

const TYPE_MAP: Record<string, TaskType> = {
  work: T.Work,
  home: T.Home,
};

const SORT_MAP: Record<string, TaskSortField> = {
  deadline: 'deadline',
  priority: 'priority',
  date: 'date',
  created: 'createdAt',
  updated: 'updatedAt',
  id: 'id',
};

const ID_RE = /^\d+$/;

// Matches prefix:value tokens — value can be quoted or unquoted
const TOKEN_RE = /\b(priority|type|date|has|no|sort|id):("[^"]*"|[^\s]+)/gi;

export function parseSearchFilters(query: string, now?: Date): SearchFilters {
  const filters: SearchFilters = {
    nameQuery: '',
    priority: null,
    taskType: null,
    date: null,
    hasDeadline: null,
    sort: null,
    id: null,
  };

  const remaining = query.replace(TOKEN_RE, (token: string, prefix: string, rawValue: string) => {
    const unquoted = rawValue.replace(/^"|"$/g, '');
    const value = unquoted.toLowerCase();

    switch (prefix.toLowerCase()) {
      case 'priority': {
        const priority = PRIORITY_MAP[value];
        if (priority === undefined) return token; // Unknown value — keep as text
        filters.priority = priority;
        return '';
      }
      case 'type': {
        const taskType = TYPE_MAP[value];
        if (taskType === undefined) return token;
        filters.taskType = taskType;
        return '';
      }
      case 'date': {
        const date = parseDate(unquoted, now);
        if (date === null) return token;
        filters.date = date;
        return '';
      }
      case 'has':
      case 'no':
        if (value !== 'deadline') return token;
        filters.hasDeadline = prefix.toLowerCase() === 'has';
        return '';
      case 'sort': {
        const descending = value.startsWith('-');
        const by = SORT_MAP[descending ? value.slice(1) : value];
        if (by === undefined) return token;
        filters.sort = { by, direction: descending ? 'desc' : 'asc' };
        return '';
      }
      case 'id':
        if (!ID_RE.test(value)) return token;
        filters.id = parseInt(value, 10);
        return '';
      default:
        return token;
    }
  });

  filters.nameQuery = remaining.replace(/\s+/g, ' ').trim();
  return filters;
}
