import { v4 as uuidv4 } from 'uuid';

/** uuid v4 without dashes, e.g. for ORD-/CMD-/EVT- identifiers */
export function compactUuid(): string {
  return uuidv4().replace(/-/g, '');
}

export function prefixedId(prefix: string): string {
  return `${prefix}${compactUuid()}`;
}
