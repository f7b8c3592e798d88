/**
 * Natural keys: structural identifiers that match local entities to remote
 * items without relying on remote-assigned ids.
 *
 * String forms:
 *   phase/<n>
 *   group/<n>/<encoded group title>
 *   task/<n>/<encoded group title or empty>/<task id>
 */

export type EntityKind = 'phase' | 'group' | 'task';

export type NaturalKey =
  | { kind: 'phase'; phase: number }
  | { kind: 'group'; phase: number; group: string }
  | { kind: 'task'; phase: number; group: string | null; taskId: string };

const MARKER_PREFIX = 'spec-sync:';
const MARKER_PATTERN = /<!--\s*spec-sync:(\S+)\s*-->/;

export function phaseKey(phase: number): NaturalKey {
  return { kind: 'phase', phase };
}

export function groupKey(phase: number, group: string): NaturalKey {
  return { kind: 'group', phase, group };
}

export function taskKey(phase: number, group: string | null, taskId: string): NaturalKey {
  return { kind: 'task', phase, group, taskId };
}

export function keyToString(key: NaturalKey): string {
  switch (key.kind) {
    case 'phase':
      return `phase/${key.phase}`;
    case 'group':
      return `group/${key.phase}/${encodeURIComponent(key.group)}`;
    case 'task':
      return `task/${key.phase}/${key.group === null ? '' : encodeURIComponent(key.group)}/${key.taskId}`;
  }
}

/**
 * Inverse of keyToString. Returns null for anything that is not a key.
 */
export function parseKeyString(value: string): NaturalKey | null {
  const parts = value.split('/');
  const phase = Number.parseInt(parts[1] ?? '', 10);
  if (Number.isNaN(phase) || String(phase) !== parts[1]) {
    return null;
  }

  try {
    if (parts[0] === 'phase' && parts.length === 2) {
      return phaseKey(phase);
    }
    if (parts[0] === 'group' && parts.length === 3 && parts[2]) {
      return groupKey(phase, decodeURIComponent(parts[2]));
    }
    if (parts[0] === 'task' && parts.length === 4 && parts[3]) {
      return taskKey(phase, parts[2] ? decodeURIComponent(parts[2]) : null, parts[3]);
    }
  } catch (error) {
    if (error instanceof URIError) {
      return null;
    }
    throw error;
  }

  return null;
}

/**
 * Hidden marker embedded in an issue body so the item can be found again
 */
export function formatKeyMarker(key: NaturalKey): string {
  return `<!-- ${MARKER_PREFIX}${keyToString(key)} -->`;
}

/**
 * Key string carried by a body's marker, if any
 */
export function extractKeyMarker(body: string | null | undefined): string | null {
  if (!body) {
    return null;
  }
  const match = MARKER_PATTERN.exec(body);
  return match && parseKeyString(match[1]) ? match[1] : null;
}
