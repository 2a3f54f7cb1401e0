export const Priority = {
  High: 'HIGH',
  Medium: 'MEDIUM',
  Low: 'LOW',
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

/** Closed set, in rank order. Mirrors the chk_priority_enum constraint. */
export const PRIORITY_VALUES = [Priority.High, Priority.Medium, Priority.Low] as const;

/** Sort rank: High first */
export const PriorityRank: Record<Priority, number> = {
  [Priority.High]: 1,
  [Priority.Medium]: 2,
  [Priority.Low]: 3,
};

export function isPriority(value: unknown): value is Priority {
  return typeof value === 'string' && (PRIORITY_VALUES as readonly string[]).includes(value);
}
