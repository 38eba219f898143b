import { describe, it, expect } from 'vitest';
import { slugify, fileKey, truncateUtf8, MAX_SLUG_LENGTH, MAX_STEM_BYTES } from './slugify';

describe('slugify', () => {
  it('trims and replaces path-unsafe characters and whitespace', () => {
    expect(slugify('  Court Ruling: Smith v. Jones ')).toBe('Court_Ruling__Smith_v._Jones');
    expect(slugify('a/b\\c*d?e"f<g>h|i\tj')).toBe('a_b_c_d_e_f_g_h_i_j');
  });

  it('replaces control characters', () => {
    expect(slugify('Budget\u0000Vote')).toBe('Budget_Vote');
    expect(slugify('a\u001bb\u007fc')).toBe('a_b_c');
  });

  it('truncates long names', () => {
    expect(slugify('x'.repeat(250))).toHaveLength(MAX_SLUG_LENGTH);
  });

  it('bounds multi-byte names by UTF-8 length', () => {
    const slug = slugify('交'.repeat(100));
    expect(Buffer.byteLength(slug, 'utf8')).toBe(198);
    expect(slug).toBe('交'.repeat(66));
  });

  it('never splits a surrogate pair', () => {
    const slug = slugify('📰'.repeat(60));
    expect(slug).toBe('📰'.repeat(50));
  });

  it('returns an empty slug for blank names', () => {
    expect(slugify('   ')).toBe('');
  });
});

describe('truncateUtf8', () => {
  it('cuts between code points', () => {
    expect(truncateUtf8('aé交', 3)).toBe('aé');
    expect(truncateUtf8('aé交', 5)).toBe('aé');
    expect(truncateUtf8('aé交', 6)).toBe('aé交');
  });
});

describe('fileKey', () => {
  it('percent-encodes short ids', () => {
    expect(fileKey('nyt://article/1')).toBe('nyt%3A%2F%2Farticle%2F1.json');
  });

  it('bounds long ids and keeps them distinct', () => {
    const a = fileKey(`${'文'.repeat(300)}a`);
    const b = fileKey(`${'文'.repeat(300)}b`);
    expect(a).not.toBe(b);
    expect(a.length).toBe(MAX_STEM_BYTES + '.json'.length);
    expect(a).toMatch(/~[0-9a-f]{16}\.json$/);
  });
});
