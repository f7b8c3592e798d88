import { describe, it, expect } from 'vitest';
import {
  extractKeyMarker,
  formatKeyMarker,
  groupKey,
  keyToString,
  parseKeyString,
  phaseKey,
  taskKey,
} from '../reconcile/keys.js';

describe('Natural Keys', () => {
  describe('keyToString', () => {
    it('should format each kind', () => {
      expect(keyToString(phaseKey(3))).toBe('phase/3');
      expect(keyToString(groupKey(2, 'Models'))).toBe('group/2/Models');
      expect(keyToString(taskKey(2, 'Models', 'T004'))).toBe('task/2/Models/T004');
    });

    it('should leave the group segment empty for direct tasks', () => {
      expect(keyToString(taskKey(1, null, 'T001'))).toBe('task/1//T001');
    });

    it('should encode group titles', () => {
      expect(keyToString(groupKey(4, 'API / Backend'))).toBe('group/4/API%20%2F%20Backend');
    });
  });

  describe('parseKeyString', () => {
    it('should invert keyToString', () => {
      expect(parseKeyString('group/4/API%20%2F%20Backend')).toEqual(groupKey(4, 'API / Backend'));
      expect(parseKeyString('task/1//T001')).toEqual(taskKey(1, null, 'T001'));
      expect(parseKeyString('phase/12')).toEqual(phaseKey(12));
    });

    it('should reject anything that is not a key', () => {
      expect(parseKeyString('phase/one')).toBeNull();
      expect(parseKeyString('phase/01')).toBeNull();
      expect(parseKeyString('group/1/')).toBeNull();
      expect(parseKeyString('task/1/Models')).toBeNull();
      expect(parseKeyString('group/1/%E0%A4%A')).toBeNull();
      expect(parseKeyString('milestone/1')).toBeNull();
    });
  });

  describe('markers', () => {
    it('should embed the key in an HTML comment', () => {
      expect(formatKeyMarker(taskKey(2, 'Models', 'T005'))).toBe('<!-- spec-sync:task/2/Models/T005 -->');
    });

    it('should find the marker anywhere in a body', () => {
      const body = `Some text\n\n---\n${formatKeyMarker(groupKey(2, 'Models'))}\n`;

      expect(extractKeyMarker(body)).toBe('group/2/Models');
    });

    it('should ignore bodies without a valid marker', () => {
      expect(extractKeyMarker(undefined)).toBeNull();
      expect(extractKeyMarker('')).toBeNull();
      expect(extractKeyMarker('plain issue')).toBeNull();
      expect(extractKeyMarker('<!-- spec-sync:nonsense -->')).toBeNull();
    });
  });
});
