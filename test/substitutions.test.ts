import { expect } from 'chai';
import {
  buildHomoglyphMap,
  buildNormalizationMap,
  buildReverseSubstitutions,
  buildSubstitutionTable,
  compareGlyphs,
  createSubstitutionTables,
  getDefaultTables,
} from '../src/substitutions';
import { captureConsole } from './helpers/test-setup';

describe('Substitution tables', function() {
  describe('default tables', function() {
    const tables = getDefaultTables();

    it('should list letters a-z then digits 0-9', function() {
      const bases = tables.substitutions.map((entry) => entry.base);
      expect(bases).to.have.length(36);
      expect(bases[0]).to.equal('a');
      expect(bases[25]).to.equal('z');
      expect(bases[26]).to.equal('0');
      expect(bases[35]).to.equal('9');
    });

    it('should keep variants sorted and free of duplicates', function() {
      for (const { base, variants } of tables.substitutions) {
        expect(new Set(variants).size, base).to.equal(variants.length);
        expect([...variants].sort(compareGlyphs), base).to.deep.equal([...variants]);
      }
    });

    it('should resolve leetspeak glyphs to the first base that lists them', function() {
      expect(tables.normalizationMap.get('@')).to.equal('a');
      expect(tables.normalizationMap.get('$')).to.equal('s');
      expect(tables.normalizationMap.get('*')).to.equal('a');
      expect(tables.normalizationMap.get('v')).to.equal('u');
      expect(tables.normalizationMap.get('|)')).to.equal('d');
    });

    it('should keep every reading in the reverse map', function() {
      expect(Array.from(tables.reverseSubstitutions.get('1') ?? []).sort()).to.deep.equal(['1', 'i', 'l']);
      expect(tables.reverseSubstitutions.get('*')?.has('s')).to.equal(true);
      expect(tables.reverseSubstitutions.get('*')?.size).to.equal(22);
    });

    it('should map Cyrillic lookalikes to Latin', function() {
      expect(tables.homoglyphs.get('\u0430')).to.equal('a');
      expect(tables.homoglyphs.get('\u0440')).to.equal('p');
    });

    it('should be frozen', function() {
      expect(Object.isFrozen(tables)).to.equal(true);
      expect(Object.isFrozen(tables.substitutions)).to.equal(true);
    });
  });

  describe('compareGlyphs', function() {
    it('should order by code-point length first', function() {
      expect(compareGlyphs('ab', 'c')).to.be.greaterThan(0);
      expect(compareGlyphs('\u{1D41A}', 'ab')).to.be.lessThan(0);
    });

    it('should order equal lengths by code point', function() {
      expect(compareGlyphs('a', 'b')).to.be.lessThan(0);
      expect(compareGlyphs('\u{1D41A}', 'b')).to.be.greaterThan(0);
      expect(compareGlyphs('x', 'x')).to.equal(0);
    });
  });

  describe('buildSubstitutionTable', function() {
    it('should skip malformed entries and merge repeated bases', async function() {
      let table: ReturnType<typeof buildSubstitutionTable> = [];
      const warnings = await captureConsole('warn', () => {
        table = buildSubstitutionTable([
          { base: 'a', variants: ['@', '4', '4'] },
          { base: 'bb', variants: ['x'] },
          'junk',
          { base: 'c', variants: [] },
          { base: 'A', variants: ['^'] },
        ]);
      });

      expect(table).to.deep.equal([{ base: 'a', variants: ['4', '@', '^'] }]);
      expect(warnings).to.have.length(3);
    });

    it('should drop non-string variants with a warning', async function() {
      let table: ReturnType<typeof buildSubstitutionTable> = [];
      const warnings = await captureConsole('warn', () => {
        table = buildSubstitutionTable([{ base: 'e', variants: ['3', 7, ''] }]);
      });

      expect(table).to.deep.equal([{ base: 'e', variants: ['3'] }]);
      expect(warnings).to.deep.equal(['[substitutions] Dropped 2 invalid variant(s) for "e"']);
    });

    it('should return an empty table for non-array data', async function() {
      let table: ReturnType<typeof buildSubstitutionTable> = [{ base: 'x', variants: ['x'] }];
      const warnings = await captureConsole('warn', () => {
        table = buildSubstitutionTable({ a: ['4'] });
      });

      expect(table).to.deep.equal([]);
      expect(warnings).to.have.length(1);
    });
  });

  describe('derived maps', function() {
    const entries = [
      { base: 'a', variants: ['*'] },
      { base: 'b', variants: ['*', '8'] },
      { base: 'k', variants: ['x'] },
    ];

    it('should keep the first canonical for a shared glyph', function() {
      const map = buildNormalizationMap(entries);
      expect(map.get('*')).to.equal('a');
      expect(map.get('8')).to.equal('b');
    });

    it('should register upper and lower case forms', function() {
      const map = buildNormalizationMap(entries);
      expect(map.get('X')).to.equal('k');
    });

    it('should collect every canonical for a shared glyph', function() {
      const reverse = buildReverseSubstitutions(entries);
      expect(Array.from(reverse.get('*') ?? [])).to.deep.equal(['a', 'b']);
    });
  });

  describe('buildHomoglyphMap', function() {
    it('should accept single characters mapped to one Latin letter', async function() {
      let map = new Map<string, string>();
      const warnings = await captureConsole('warn', () => {
        map = buildHomoglyphMap({ '\u0430': 'A', bad: 'x', '\u03B2': '1' });
      });

      expect(Array.from(map)).to.deep.equal([['\u0430', 'a']]);
      expect(warnings).to.have.length(2);
    });
  });

  describe('createSubstitutionTables', function() {
    it('should build all maps from raw data', function() {
      const tables = createSubstitutionTables([{ base: 's', variants: ['$', '5'] }], { '\u0455': 's' });

      expect(tables.normalizationMap.get('$')).to.equal('s');
      expect(Array.from(tables.reverseSubstitutions.get('5') ?? [])).to.deep.equal(['s']);
      expect(tables.homoglyphs.get('\u0455')).to.equal('s');
    });
  });
});
