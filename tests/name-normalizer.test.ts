import { describe, it, expect } from 'vitest';
import { normalize, normalizeOptionValue } from '../src/core/name-normalizer.js';

describe('normalize', () => {
  it('should strip punctuation and join words with underscores', () => {
    expect(normalize('Lead Source!! 2024')).toBe('lead_source_2024');
  });

  it('should return an empty string for empty input', () => {
    expect(normalize('')).toBe('');
  });

  it('should trim surrounding whitespace before replacing spaces', () => {
    expect(normalize('  VIP Status  ')).toBe('vip_status');
  });

  it('should keep one underscore per space', () => {
    expect(normalize('Annual  Revenue')).toBe('annual__revenue');
  });

  it('should drop non-ASCII letters and symbols', () => {
    expect(normalize("Émile's #1 Pick")).toBe('miles_1_pick');
  });

  it('should only produce lowercase letters, digits and underscores', () => {
    const inputs = ['Hello, World!', 'A-B_C d', '%%%', 'Tab\tSeparated', 'Mixed CASE 42'];
    for (const input of inputs) {
      expect(normalize(input)).toMatch(/^[a-z0-9_]*$/);
    }
  });

  it('should keep underscores already in the input', () => {
    expect(normalize('lead_source_2024')).toBe('lead_source_2024');
    expect(normalize('Owner_Region Code')).toBe('owner_region_code');
  });

  it('should be idempotent', () => {
    const inputs = ['Lead Source!! 2024', '  x  y ', 'Already_normal', 'Déjà Vu'];
    for (const input of inputs) {
      const once = normalize(input);
      expect(normalize(once)).toBe(once);
    }
  });
});

describe('normalizeOptionValue', () => {
  it('should lowercase and replace spaces', () => {
    expect(normalizeOptionValue('Light Blue')).toBe('light_blue');
  });

  it('should keep punctuation', () => {
    expect(normalizeOptionValue('Yes/No?')).toBe('yes/no?');
  });
});
