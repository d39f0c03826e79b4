import { expect } from 'chai';
import { FALLBACK_TERMS, parseArgs, resolveTerms } from '../src/cli';

describe('CLI', function() {
  describe('parseArgs', function() {
    it('should join free arguments into the text', function() {
      expect(parseArgs(['hello', 'there'])).to.deep.equal({
        interactive: false,
        debug: false,
        help: false,
        text: 'hello there',
      });
    });

    it('should read flags in any position', function() {
      const options = parseArgs(['-d', 'some', '--terms', 'Fuck, shit', 'text', '-i']);

      expect(options.debug).to.equal(true);
      expect(options.interactive).to.equal(true);
      expect(options.terms).to.deep.equal(['fuck', 'shit']);
      expect(options.text).to.equal('some text');
    });

    it('should reject --terms without a value', function() {
      expect(() => parseArgs(['--terms'])).to.throw('--terms needs a comma or space separated list');
    });

    it('should recognise help', function() {
      expect(parseArgs(['-h']).help).to.equal(true);
    });
  });

  describe('resolveTerms', function() {
    it('should prefer terms from the command line', function() {
      const options = parseArgs(['-t', 'crap']);
      expect(resolveTerms(options, { SWEAR_FILTER_TERMS: 'heck' })).to.deep.equal(['crap']);
    });

    it('should fall back to the environment, then the built-in list', function() {
      const options = parseArgs([]);
      expect(resolveTerms(options, { SWEAR_FILTER_TERMS: 'heck darn' })).to.deep.equal(['heck', 'darn']);
      expect(resolveTerms(options, {})).to.deep.equal(FALLBACK_TERMS);
    });
  });
});
