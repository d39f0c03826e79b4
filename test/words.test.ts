import { expect } from 'chai';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_SAFE_WORDS, loadSafeWords, splitWords } from '../src/words';
import { captureConsole } from './helpers/test-setup';

describe('Word lists', function() {
  describe('splitWords', function() {
    it('should split on commas and whitespace', function() {
      expect(splitWords('word1 word2,word3, word4')).to.deep.equal(['word1', 'word2', 'word3', 'word4']);
    });

    it('should lowercase and de-duplicate in order', function() {
      expect(splitWords('Fuck, SHIT  damn,fuck')).to.deep.equal(['fuck', 'shit', 'damn']);
    });

    it('should drop characters other than letters and digits', function() {
      expect(splitWords('f*ck, sh!t, b4d')).to.deep.equal(['fck', 'sht', 'b4d']);
    });

    it('should return nothing for blank input', function() {
      expect(splitWords('')).to.deep.equal([]);
      expect(splitWords(' , ,, ')).to.deep.equal([]);
    });
  });

  describe('DEFAULT_SAFE_WORDS', function() {
    it('should contain place names and everyday words', function() {
      expect(DEFAULT_SAFE_WORDS).to.include('scunthorpe');
      expect(DEFAULT_SAFE_WORDS).to.include('assignment');
      expect(DEFAULT_SAFE_WORDS).to.include('classic');
    });
  });

  describe('loadSafeWords', function() {
    let dir: string;

    before(function() {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'safe-words-'));
    });

    after(function() {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should return the built-in list without a file', function() {
      const words = loadSafeWords(['fuck']);
      expect(Array.from(words)).to.deep.equal([...DEFAULT_SAFE_WORDS]);
    });

    it('should add dictionary words except banned terms and their inflections', function() {
      const file = path.join(dir, 'words.txt');
      fs.writeFileSync(file, 'Apple\nfuck\nfucks\nfuckingly\nshitty\nshitake\n\nBanana\r\n');

      const words = loadSafeWords(['Fuck', 'shit'], file);

      expect(words.has('apple')).to.equal(true);
      expect(words.has('banana')).to.equal(true);
      expect(words.has('fuckingly')).to.equal(true);
      expect(words.has('fuck')).to.equal(false);
      expect(words.has('fucks')).to.equal(false);
      expect(words.has('shitty')).to.equal(false);
      expect(words.has('shitake')).to.equal(false);
      expect(words.has('scunthorpe')).to.equal(true);
    });

    it('should read the file as latin1', function() {
      const file = path.join(dir, 'latin1.txt');
      fs.writeFileSync(file, Buffer.from('café\n', 'latin1'));

      expect(loadSafeWords([], file).has('café')).to.equal(true);
    });

    it('should warn and fall back when the file is missing', async function() {
      let words = new Set<string>();
      const warnings = await captureConsole('warn', () => {
        words = loadSafeWords([], path.join(dir, 'missing.txt'));
      });

      expect(warnings).to.have.length(1);
      expect(words.size).to.equal(new Set(DEFAULT_SAFE_WORDS).size);
    });
  });
});
